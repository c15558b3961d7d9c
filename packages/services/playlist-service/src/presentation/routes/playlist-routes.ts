/**
 * Playlist Routes
 * Mounted under /api/playlists
 */

import express from 'express';
import type { PlaylistManager } from '../../application/services';
import { PlaylistController } from '../controllers';
import { playlistContextMiddleware } from '../middleware/logging';
import { safe } from '../middleware/safe';
import { validateBody, validateParams, validationSchemas } from '../middleware/validation';

export function createPlaylistRoutes(manager: PlaylistManager): express.Router {
  const router = express.Router();
  const controller = new PlaylistController(manager);
  const withId = [validateParams(validationSchemas['playlist-params']), playlistContextMiddleware()];

  router.get('/', safe((req, res) => controller.list(req, res)));
  router.post('/', validateBody(validationSchemas['create-playlist']), safe((req, res) => controller.create(req, res)));
  router.get('/:id', withId, safe((req, res) => controller.get(req, res)));
  router.patch('/:id', withId, validateBody(validationSchemas.rename), safe((req, res) => controller.rename(req, res)));
  router.delete('/:id', withId, safe((req, res) => controller.remove(req, res)));

  // Insertion
  router.post(
    '/:id/entries',
    withId,
    validateBody(validationSchemas['insert-entries']),
    safe((req, res) => controller.insertEntries(req, res))
  );
  router.post(
    '/:id/library',
    withId,
    validateBody(validationSchemas['insert-library']),
    safe((req, res) => controller.insertLibraryItems(req, res))
  );
  router.post(
    '/:id/urls',
    withId,
    validateBody(validationSchemas['insert-urls']),
    safe((req, res) => controller.insertUrls(req, res))
  );
  router.post(
    '/:id/radio',
    withId,
    validateBody(validationSchemas['insert-radio']),
    safe((req, res) => controller.insertRadioStations(req, res))
  );

  // Mutation
  router.post(
    '/:id/remove',
    withId,
    validateBody(validationSchemas['remove-rows']),
    safe((req, res) => controller.removeRows(req, res))
  );
  router.post(
    '/:id/move',
    withId,
    validateBody(validationSchemas['move-rows']),
    safe((req, res) => controller.moveRows(req, res))
  );
  router.post('/:id/clear', withId, safe((req, res) => controller.clear(req, res)));
  router.post('/:id/remove-invalid', withId, safe((req, res) => controller.removeInvalid(req, res)));
  router.post('/:id/remove-unqueued', withId, safe((req, res) => controller.removeUnqueued(req, res)));
  router.post('/:id/undo', withId, safe((req, res) => controller.undo(req, res)));
  router.post('/:id/redo', withId, safe((req, res) => controller.redo(req, res)));

  // Ordering & playback
  router.post('/:id/sort', withId, validateBody(validationSchemas.sort), safe((req, res) => controller.sort(req, res)));
  router.post('/:id/shuffle', withId, safe((req, res) => controller.shuffle(req, res)));
  router.put(
    '/:id/modes',
    withId,
    validateBody(validationSchemas['set-modes']),
    safe((req, res) => controller.setModes(req, res))
  );
  router.put(
    '/:id/current',
    withId,
    validateBody(validationSchemas['set-current']),
    safe((req, res) => controller.setCurrent(req, res))
  );
  router.post('/:id/next', withId, safe((req, res) => controller.next(req, res)));
  router.post('/:id/previous', withId, safe((req, res) => controller.previous(req, res)));
  router.post(
    '/:id/stop-after',
    withId,
    validateBody(validationSchemas['stop-after']),
    safe((req, res) => controller.toggleStopAfter(req, res))
  );
  router.post('/:id/rating', withId, validateBody(validationSchemas.rate), safe((req, res) => controller.rate(req, res)));

  // Persistence & dynamic
  router.post('/:id/save', withId, safe((req, res) => controller.save(req, res)));
  router.post('/:id/restore', withId, safe((req, res) => controller.restore(req, res)));
  router.post('/:id/dynamic/off', withId, safe((req, res) => controller.turnOffDynamic(req, res)));
  router.post('/:id/dynamic/repopulate', withId, safe((req, res) => controller.repopulateDynamic(req, res)));

  return router;
}
