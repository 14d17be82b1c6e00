/**
 * BotConfigDAO unit tests
 */

import { db } from '../../src/database/connection';
import { BotConfigDAO, BotConfigRow } from '../../src/database/dao/BotConfigDAO';
import { queryResult } from '../helpers/db';

jest.mock('../../src/database/connection', () => ({
  db: { query: jest.fn() },
}));
const mockQuery = jest.mocked(db.query);

describe('BotConfigDAO', () => {
  let dao: BotConfigDAO;

  const row: BotConfigRow = {
    bot_id: 1,
    chat_id: '-100200300',
    chat_name: 'Test chat',
    chat_type: 'supergroup',
    welcome_message: null,
    auto_responses: [{ trigger: 'привет', reply: 'Здравствуйте!' }, { trigger: 1 }],
    blocked_words: '["spam", 5]',
    commands: { rules: 'Правила', broken: 7 },
    warn_threshold: 3,
    mute_duration: 300,
    max_message_length: 1000,
    created_at: new Date('2026-01-01T00:00:00Z'),
    updated_at: new Date('2026-01-02T00:00:00Z'),
  };

  beforeEach(() => {
    dao = new BotConfigDAO();
  });

  describe('findByChat', () => {
    it('should parse JSON columns and drop malformed entries', async () => {
      mockQuery.mockResolvedValue(queryResult([row]));

      const result = await dao.findByChat(1, '-100200300');

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        bot_id: 1,
        chat_id: '-100200300',
        chat_name: 'Test chat',
        chat_type: 'supergroup',
        welcome_message: undefined,
        auto_responses: [{ trigger: 'привет', reply: 'Здравствуйте!' }],
        blocked_words: ['spam'],
        commands: { rules: 'Правила' },
        warn_threshold: 3,
        mute_duration: 300,
        max_message_length: 1000,
        created_at: new Date('2026-01-01T00:00:00Z'),
        updated_at: new Date('2026-01-02T00:00:00Z'),
      });
      expect(mockQuery).toHaveBeenCalledWith(
        'SELECT * FROM bot_configs WHERE bot_id = $1 AND chat_id = $2',
        [1, '-100200300'],
      );
    });

    it('should report a missing config as success without data', async () => {
      mockQuery.mockResolvedValue(queryResult([]));

      await expect(dao.findByChat(1, 'missing')).resolves.toEqual({
        success: true,
        data: undefined,
      });
    });

    it('should return the database error message', async () => {
      mockQuery.mockRejectedValue(new Error('connection refused'));

      await expect(dao.findByChat(1, 'x')).resolves.toEqual({
        success: false,
        error: 'connection refused',
      });
    });
  });

  describe('save', () => {
    it('should upsert with JSON-encoded collections', async () => {
      mockQuery.mockResolvedValue(queryResult([row]));

      const result = await dao.save({
        bot_id: 1,
        chat_id: '-100200300',
        chat_name: 'Test chat',
        auto_responses: [{ trigger: 'привет', reply: 'Здравствуйте!' }],
        blocked_words: ['spam'],
        commands: { rules: 'Правила' },
        warn_threshold: 3,
        mute_duration: 300,
        max_message_length: 1000,
      });

      expect(result.success).toBe(true);
      const [query, params] = mockQuery.mock.calls[0];
      expect(query).toContain('ON CONFLICT (bot_id, chat_id) DO UPDATE');
      expect(params).toEqual([
        1,
        '-100200300',
        'Test chat',
        null,
        null,
        '[{"trigger":"привет","reply":"Здравствуйте!"}]',
        '["spam"]',
        '{"rules":"Правила"}',
        3,
        300,
        1000,
      ]);
    });
  });

  describe('create', () => {
    const data = {
      bot_id: 1,
      chat_id: '-100200300',
      auto_responses: [],
      blocked_words: [],
      commands: {},
      warn_threshold: 3,
      mute_duration: 300,
      max_message_length: 1000,
    };

    it('should insert without overwriting an existing row', async () => {
      mockQuery.mockResolvedValue(queryResult([row]));

      const result = await dao.create(data);

      expect(result).toMatchObject({ success: true, affected_rows: 1 });
      expect(result.data?.chat_name).toBe('Test chat');
      expect(mockQuery).toHaveBeenCalledTimes(1);
      expect(mockQuery.mock.calls[0][0]).toContain(
        'ON CONFLICT (bot_id, chat_id) DO NOTHING',
      );
      expect(mockQuery.mock.calls[0][0]).not.toContain('DO UPDATE');
    });

    it('should return the stored row when the chat already has one', async () => {
      mockQuery
        .mockResolvedValueOnce(queryResult([], 0))
        .mockResolvedValueOnce(queryResult([row]));

      const result = await dao.create(data);

      expect(result).toMatchObject({ success: true, affected_rows: 0 });
      expect(result.data?.auto_responses).toEqual([
        { trigger: 'привет', reply: 'Здравствуйте!' },
      ]);
      expect(mockQuery.mock.calls[1]).toEqual([
        'SELECT * FROM bot_configs WHERE bot_id = $1 AND chat_id = $2',
        [1, '-100200300'],
      ]);
    });

    it('should fail when the row is neither inserted nor found', async () => {
      mockQuery.mockResolvedValue(queryResult([], 0));

      await expect(dao.create(data)).resolves.toEqual({
        success: false,
        error: 'Bot config was not stored',
      });
    });
  });

  describe('findByBot', () => {
    it('should map every row', async () => {
      mockQuery.mockResolvedValue(queryResult([row, { ...row, chat_id: '2' }]));

      const result = await dao.findByBot(1);

      expect(result.data?.map((config) => config.chat_id)).toEqual(['-100200300', '2']);
    });
  });

  describe('delete', () => {
    it('should report false when nothing was deleted', async () => {
      mockQuery.mockResolvedValue(queryResult([], 0));

      await expect(dao.delete(1, 'x')).resolves.toEqual({
        success: true,
        data: false,
        affected_rows: 0,
      });
    });

    it('should report true when a row was deleted', async () => {
      mockQuery.mockResolvedValue(queryResult([], 1));

      await expect(dao.delete(1, 'x')).resolves.toEqual({
        success: true,
        data: true,
        affected_rows: 1,
      });
    });

    it('should report a database failure', async () => {
      mockQuery.mockRejectedValue(new Error('down'));

      await expect(dao.delete(1, 'x')).resolves.toEqual({
        success: false,
        error: 'down',
      });
    });
  });
});
