import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';

vi.mock('@tracklane/platform-core', async importOriginal => ({
  ...(await importOriginal<typeof import('@tracklane/platform-core')>()),
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { PlaylistManager } from '../../application/services';
import { UrlTrackResolver } from '../../infrastructure/clients';
import { InMemoryPlaylistBackend } from '../../infrastructure/database/InMemoryPlaylistBackend';
import { createApp } from '../../presentation/app';
import { testConfig } from '../fixtures';

const songs = ['A', 'B', 'C'].map(title => ({
  kind: 'url',
  metadata: { title, url: `http://media.test/${title}.mp3`, durationSeconds: 180 },
}));

function titlesOf(body: { data: { entries: Array<{ title: string }> } }): string[] {
  return body.data.entries.map(entry => entry.title);
}

describe('Playlist API Routes', () => {
  let app: Express;

  beforeEach(() => {
    const manager = new PlaylistManager({
      backend: new InMemoryPlaylistBackend(),
      urlResolver: new UrlTrackResolver(),
      config: testConfig,
    });
    app = createApp({ manager });
  });

  async function createWithSongs(id = 'road'): Promise<void> {
    await request(app).post('/api/playlists').send({ name: 'Road trip', id }).expect(201);
    await request(app).post(`/api/playlists/${id}/entries`).send({ entries: songs }).expect(200);
  }

  describe('GET /health', () => {
    it('should report the service as healthy', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({ status: 'healthy', service: 'playlist-service', openPlaylists: 0 });
    });
  });

  describe('POST /api/playlists', () => {
    it('should create an empty playlist', async () => {
      const response = await request(app).post('/api/playlists').send({ name: 'Road trip', id: 'road' });

      expect(response.status).toBe(201);
      expect(response.body.data).toMatchObject({
        id: 'road',
        name: 'Road trip',
        size: 0,
        currentRow: null,
        shuffleMode: 'off',
        repeatMode: 'off',
        dynamic: false,
        entries: [],
      });
      expect(response.body.data.history.canUndo).toBe(false);
    });

    it('should reject a duplicate id', async () => {
      await request(app).post('/api/playlists').send({ name: 'Road trip', id: 'road' }).expect(201);

      const response = await request(app).post('/api/playlists').send({ name: 'Again', id: 'road' });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe('PLAYLIST_ALREADY_EXISTS');
      expect(response.body.error.message).toBe('Playlist already exists: road');
    });

    it('should reject a missing name', async () => {
      const response = await request(app).post('/api/playlists').send({ id: 'road' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details.errors[0].field).toBe('name');
    });
  });

  describe('insertion and undo', () => {
    it('should insert entries and describe the undo step', async () => {
      await request(app).post('/api/playlists').send({ name: 'Road trip', id: 'road' }).expect(201);

      const response = await request(app).post('/api/playlists/road/entries').send({ entries: songs });

      expect(response.status).toBe(200);
      expect(response.body.data.inserted).toEqual({ start: 0, count: 3, rejected: [] });
      expect(response.body.data.playlist.entries.map((entry: { title: string }) => entry.title)).toEqual([
        'A',
        'B',
        'C',
      ]);
      expect(response.body.data.playlist.history.undoText).toBe('Add 3 tracks');
      expect(response.body.data.playlist.totalLengthSeconds).toBe(540);
    });

    it('should reject an empty entry list', async () => {
      await request(app).post('/api/playlists').send({ name: 'Road trip', id: 'road' }).expect(201);

      const response = await request(app).post('/api/playlists/road/entries').send({ entries: [] });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details.errors[0].field).toBe('entries');
    });

    it('should move rows and undo the move', async () => {
      await createWithSongs();

      const moved = await request(app).post('/api/playlists/road/move').send({ rows: [0], destination: 2 });
      expect(moved.body.data.movedTo).toBe(2);
      expect(moved.body.data.playlist.entries.map((entry: { title: string }) => entry.title)).toEqual(['B', 'C', 'A']);

      const undone = await request(app).post('/api/playlists/road/undo');
      expect(undone.status).toBe(200);
      expect(undone.body.data.undone).toBe('Move 1 track');
      expect(undone.body.data.playlist.entries.map((entry: { title: string }) => entry.title)).toEqual(['A', 'B', 'C']);
    });

    it('should answer 409 when there is nothing to undo', async () => {
      await request(app).post('/api/playlists').send({ name: 'Road trip', id: 'road' }).expect(201);

      const response = await request(app).post('/api/playlists/road/undo');

      expect(response.status).toBe(409);
      expect(response.body.error).toMatchObject({ code: 'NOTHING_TO_UNDO', message: 'Nothing to undo' });
    });

    it('should reject an out-of-range removal', async () => {
      await createWithSongs();

      const response = await request(app).post('/api/playlists/road/remove').send({ rows: [7] });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('OUT_OF_RANGE');
    });
  });

  describe('playback', () => {
    it('should set the current row and report the scrobble point', async () => {
      await createWithSongs();

      const response = await request(app).put('/api/playlists/road/current').send({ row: 0 });

      expect(response.body.data).toEqual({
        currentRow: 0,
        lastPlayedRow: null,
        stopAfterRow: null,
        scrobblePointSeconds: 90,
      });
    });

    it('should update the repeat mode', async () => {
      await createWithSongs();

      const response = await request(app).put('/api/playlists/road/modes').send({ repeat: 'playlist' });

      expect(response.body.data).toEqual({ shuffleMode: 'off', repeatMode: 'playlist' });
    });

    it('should require at least one mode', async () => {
      await createWithSongs();

      const response = await request(app).put('/api/playlists/road/modes').send({});

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('persistence', () => {
    it('should reopen a saved playlist after it was closed', async () => {
      await createWithSongs();

      const saved = await request(app).post('/api/playlists/road/save');
      expect(saved.body.data).toEqual({ id: 'road', saved: true });

      await request(app).delete('/api/playlists/road').expect(204);

      const reopened = await request(app).get('/api/playlists/road');
      expect(reopened.status).toBe(200);
      expect(titlesOf(reopened.body)).toEqual(['A', 'B', 'C']);
    });

    it('should answer 404 for a playlist that was never saved', async () => {
      const response = await request(app).get('/api/playlists/missing');

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({
        code: 'PLAYLIST_NOT_FOUND',
        message: 'Playlist not found: missing',
      });
    });
  });

  describe('middleware', () => {
    it('should echo the correlation id', async () => {
      const response = await request(app).get('/health').set('x-correlation-id', 'test-correlation');

      expect(response.headers['x-correlation-id']).toBe('test-correlation');
    });

    it('should answer unknown routes with a JSON 404', async () => {
      const response = await request(app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route not found: GET /nope' });
    });
  });
});
