// tests/integration/attendance.integration.test.ts
import request from 'supertest';
import { app } from '@/app';
import { setDatabase } from '@/lib/database';
import { FailingStore, MemoryStore } from '../helpers/memoryStore';

const ISO_UTC = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

const mockNow = (iso: string) => jest.spyOn(Date, 'now').mockReturnValue(Date.parse(iso));

describe('Attendance API Endpoints', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
    setDatabase(store);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    setDatabase(null);
  });

  describe('POST /api/attendance', () => {
    it('should record a trimmed name with a server timestamp', async () => {
      const response = await request(app).post('/api/attendance').send({ name: '  Alice  ' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ id: 'mem-1', name: 'Alice', timestamp: expect.stringMatching(ISO_UTC) });
      expect(store.documents('attendance')).toHaveLength(1);
      expect(store.documents('attendance')[0]).toMatchObject({ name: 'Alice', timestamp: response.body.timestamp });
    });

    it('should ignore a client-supplied timestamp', async () => {
      mockNow('2024-05-01T08:00:00.000Z');

      const response = await request(app)
        .post('/api/attendance')
        .send({ name: 'Bob', timestamp: '1999-01-01T00:00:00.000Z' });

      expect(response.status).toBe(200);
      expect(response.body.timestamp).toBe('2024-05-01T08:00:00.000Z');
    });

    it.each(['', '   '])('should return 400 for the blank name %j and persist nothing', async (name) => {
      const response = await request(app).post('/api/attendance').send({ name });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ detail: 'Name is required' });
      expect(store.documents('attendance')).toHaveLength(0);
    });

    it('should return 422 when name is missing', async () => {
      const response = await request(app).post('/api/attendance').send({});

      expect(response.status).toBe(422);
      expect(response.body).toEqual({ detail: [{ loc: ['body', 'name'], msg: 'Required' }] });
    });

    it('should hand out non-decreasing timestamps', async () => {
      const timestamps: string[] = [];
      for (const name of ['one', 'two', 'three']) {
        const response = await request(app).post('/api/attendance').send({ name });
        timestamps.push(response.body.timestamp);
      }

      expect(timestamps).toEqual([...timestamps].sort());
    });

    it('should return 503 when no database is configured', async () => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
      setDatabase(null);

      const response = await request(app).post('/api/attendance').send({ name: 'Alice' });

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ detail: 'Database is not configured' });
    });
  });

  describe('GET /api/attendance', () => {
    it('should return an empty list when nothing is recorded', async () => {
      const response = await request(app).get('/api/attendance');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([]);
    });

    it('should list the later check-in first', async () => {
      const now = mockNow('2024-05-01T08:00:00.000Z');
      await request(app).post('/api/attendance').send({ name: 'A' });
      now.mockReturnValue(Date.parse('2024-05-01T08:05:00.000Z'));
      await request(app).post('/api/attendance').send({ name: 'B' });

      const response = await request(app).get('/api/attendance');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([
        { id: 'mem-2', name: 'B', timestamp: '2024-05-01T08:05:00.000Z' },
        { id: 'mem-1', name: 'A', timestamp: '2024-05-01T08:00:00.000Z' },
      ]);
    });

    it('should fall back to created_at for documents without a timestamp', async () => {
      mockNow('2024-05-01T08:00:00.000Z');
      await request(app).post('/api/attendance').send({ name: 'Current' });
      store.seed('attendance', { _id: 'legacy-1', name: 'Legacy', created_at: new Date('2023-01-01T00:00:00.000Z') });
      store.seed('attendance', { _id: 'legacy-2', name: 'Unstamped' });

      const response = await request(app).get('/api/attendance');

      expect(response.body).toEqual([
        { id: 'mem-1', name: 'Current', timestamp: '2024-05-01T08:00:00.000Z' },
        { id: 'legacy-1', name: 'Legacy', timestamp: '2023-01-01T00:00:00.000Z' },
        { id: 'legacy-2', name: 'Unstamped', timestamp: null },
      ]);
    });

    it('should return identical results on repeated reads', async () => {
      await request(app).post('/api/attendance').send({ name: 'A' });
      await request(app).post('/api/attendance').send({ name: 'B' });

      const first = await request(app).get('/api/attendance');
      const second = await request(app).get('/api/attendance');

      expect(second.body).toEqual(first.body);
    });

    it('should return 500 when the store fails', async () => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
      setDatabase(new FailingStore(new Error('socket closed')));

      const response = await request(app).get('/api/attendance');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ detail: 'Internal Server Error' });
    });
  });
});
