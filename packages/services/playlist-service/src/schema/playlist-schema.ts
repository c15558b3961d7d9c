/**
 * Playlist Service - Schema
 * All tables use the 'pls_' prefix
 */

import {
  pgTable,
  varchar,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  doublePrecision,
  index,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';
import { sql, relations } from 'drizzle-orm';
import { createSelectSchema } from 'drizzle-zod';
import { z } from 'zod';
import { REPEAT_MODES, SHUFFLE_MODES } from '../domains/playlist/entities/PlaybackOrder';

// ===== TABLES =====

export const playlists = pgTable('pls_playlists', {
  id: varchar('id', { length: 64 }).primaryKey(),
  name: varchar('name').notNull(),
  currentRow: integer('current_row'),
  lastPlayedRow: integer('last_played_row'),
  stopAfterRow: integer('stop_after_row'),
  repeatMode: varchar('repeat_mode', { length: 16 }).notNull().default('off'),
  shuffleMode: varchar('shuffle_mode', { length: 16 }).notNull().default('off'),
  dynamicGenerator: jsonb('dynamic_generator'), // { type, config } of the generator feeding a dynamic playlist
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const playlistItems = pgTable(
  'pls_playlist_items',
  {
    id: uuid('id')
      .primaryKey()
      .default(sql`gen_random_uuid()`),
    playlistId: varchar('playlist_id', { length: 64 })
      .notNull()
      .references(() => playlists.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    kind: varchar('kind', { length: 16 }).notNull(), // library, url, radio
    libraryId: varchar('library_id', { length: 64 }),
    metadata: jsonb('metadata'), // inline metadata for url and radio entries
  },
  table => [
    uniqueIndex('idx_pls_playlist_items_position').on(table.playlistId, table.position),
    index('idx_pls_playlist_items_library').on(table.libraryId),
  ]
);

export const libraryTracks = pgTable(
  'pls_library_tracks',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    title: varchar('title').notNull(),
    artist: varchar('artist').notNull().default(''),
    album: varchar('album').notNull().default(''),
    albumArtist: varchar('album_artist'),
    compilation: boolean('compilation').notNull().default(false),
    durationSeconds: integer('duration_seconds').notNull().default(0),
    trackNumber: integer('track_number'),
    disc: integer('disc'),
    year: integer('year'),
    genre: varchar('genre'),
    url: text('url'),
    rating: doublePrecision('rating'),
    playCount: integer('play_count').notNull().default(0),
    unavailable: boolean('unavailable').notNull().default(false),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  table => [index('idx_pls_library_tracks_album').on(table.albumArtist, table.album)]
);

// ===== RELATIONS =====

export const playlistsRelations = relations(playlists, ({ many }) => ({
  items: many(playlistItems),
}));

export const playlistItemsRelations = relations(playlistItems, ({ one }) => ({
  playlist: one(playlists, {
    fields: [playlistItems.playlistId],
    references: [playlists.id],
  }),
}));

// ===== ROW VALIDATION =====

export const trackMetadataSchema = z.object({
  title: z.string(),
  artist: z.string().default(''),
  album: z.string().default(''),
  albumArtist: z.string().optional(),
  compilation: z.boolean().optional(),
  durationSeconds: z.number().nonnegative().default(0),
  trackNumber: z.number().int().optional(),
  disc: z.number().int().optional(),
  year: z.number().int().optional(),
  genre: z.string().optional(),
  url: z.string().optional(),
  rating: z.number().min(0).max(1).optional(),
  playCount: z.number().int().nonnegative().optional(),
});

export const generatorReferenceSchema = z.object({
  type: z.string().min(1),
  config: z.record(z.unknown()).default({}),
});

export const playlistRowSchema = createSelectSchema(playlists, {
  repeatMode: z.enum(REPEAT_MODES),
  shuffleMode: z.enum(SHUFFLE_MODES),
  dynamicGenerator: generatorReferenceSchema.nullable(),
});

export const persistedEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('library'), libraryId: z.string().min(1) }),
  z.object({ kind: z.literal('url'), metadata: trackMetadataSchema }),
  z.object({ kind: z.literal('radio'), metadata: trackMetadataSchema }),
]);

// ===== TYPE EXPORTS =====

export type PlaylistRow = typeof playlists.$inferSelect;
export type NewPlaylistRow = typeof playlists.$inferInsert;

export type PlaylistItemRow = typeof playlistItems.$inferSelect;
export type NewPlaylistItemRow = typeof playlistItems.$inferInsert;

export type LibraryTrackRow = typeof libraryTracks.$inferSelect;
