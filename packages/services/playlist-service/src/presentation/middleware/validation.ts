/**
 * Validation Middleware
 * Request validation using Zod schemas for the playlist service
 */

import { z } from 'zod';
import { createValidation } from '@tracklane/platform-core';
import { SERVICE_NAME } from '../../config/service-config';
import { REPEAT_MODES, SHUFFLE_MODES } from '../../domains/playlist/entities/PlaybackOrder';
import { SORT_KEYS } from '../../domains/playlist/entities/Playlist';
import { trackMetadataSchema } from '../../schema/playlist-schema';

export const { validateBody, validateParams } = createValidation(SERVICE_NAME);

const row = z.number().int().nonnegative();

const insertOptions = {
  position: z.number().int().optional(),
  playNow: z.boolean().default(false),
  enqueue: z.boolean().default(false),
};

export const validationSchemas = {
  'playlist-params': z.object({
    id: z.string().min(1).max(64),
  }),

  'create-playlist': z.object({
    name: z.string().min(1).max(200),
    id: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,64}$/, 'id may only contain letters, digits, dashes and underscores')
      .optional(),
  }),

  'insert-entries': z.object({
    entries: z
      .array(
        z.object({
          kind: z.enum(['url', 'radio']),
          metadata: trackMetadataSchema,
        })
      )
      .min(1),
    ...insertOptions,
  }),

  'insert-library': z.object({
    libraryIds: z.array(z.string().min(1)).min(1),
    ...insertOptions,
  }),

  'insert-urls': z.object({
    urls: z.array(z.string().min(1)).min(1),
    ...insertOptions,
  }),

  'insert-radio': z.object({
    stations: z.array(z.object({ name: z.string().min(1), url: z.string().url() })).min(1),
    ...insertOptions,
  }),

  'remove-rows': z.object({
    rows: z.array(row).min(1),
  }),

  'move-rows': z.object({
    rows: z.array(row).min(1),
    destination: row,
  }),

  'set-current': z.object({
    row: row.nullable(),
  }),

  'stop-after': z.object({
    row,
  }),

  'set-modes': z
    .object({
      shuffle: z.enum(SHUFFLE_MODES).optional(),
      repeat: z.enum(REPEAT_MODES).optional(),
    })
    .refine(body => body.shuffle !== undefined || body.repeat !== undefined, {
      message: 'shuffle or repeat is required',
    }),

  sort: z.object({
    key: z.enum(SORT_KEYS),
    direction: z.enum(['asc', 'desc']).default('asc'),
  }),

  rate: z.object({
    row,
    rating: z.number().min(0).max(1),
  }),

  rename: z.object({
    name: z.string().min(1).max(200),
  }),
};

export type CreatePlaylistBody = z.infer<(typeof validationSchemas)['create-playlist']>;
export type InsertEntriesBody = z.infer<(typeof validationSchemas)['insert-entries']>;
export type InsertLibraryBody = z.infer<(typeof validationSchemas)['insert-library']>;
export type InsertUrlsBody = z.infer<(typeof validationSchemas)['insert-urls']>;
export type InsertRadioBody = z.infer<(typeof validationSchemas)['insert-radio']>;
export type RemoveRowsBody = z.infer<(typeof validationSchemas)['remove-rows']>;
export type MoveRowsBody = z.infer<(typeof validationSchemas)['move-rows']>;
export type SetCurrentBody = z.infer<(typeof validationSchemas)['set-current']>;
export type StopAfterBody = z.infer<(typeof validationSchemas)['stop-after']>;
export type SetModesBody = z.infer<(typeof validationSchemas)['set-modes']>;
export type SortBody = z.infer<(typeof validationSchemas)['sort']>;
export type RateBody = z.infer<(typeof validationSchemas)['rate']>;
export type RenameBody = z.infer<(typeof validationSchemas)['rename']>;
