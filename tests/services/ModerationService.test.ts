/**
 * ModerationService unit tests
 */

import { MemoryModerationStore } from '../../src/database/memory/MemoryModerationStore';
import { ViolationDecision } from '../../src/database/models';
import { ModerationStore } from '../../src/database/stores';
import { DatabaseError } from '../../src/middleware/errorHandler';
import { ModerationService } from '../../src/services/ModerationService';
import { BOT_ID, CHAT_ID } from '../helpers/factories';

describe('ModerationService', () => {
  const key = { bot_id: BOT_ID, chat_id: CHAT_ID, user_id: '42' };
  const spam: ViolationDecision = {
    verdict: 'spam',
    reason: 'Слишком много восклицательных знаков: 7',
  };
  const config = { warn_threshold: 3, mute_duration: 300 };

  let store: MemoryModerationStore;
  let service: ModerationService;

  beforeEach(() => {
    store = new MemoryModerationStore();
    service = new ModerationService(store);
  });

  describe('plan', () => {
    it('should warn and count the first violation', async () => {
      const plan = await service.plan(spam, config, key, { userName: '@tester' });

      expect(plan).toEqual({
        deleteMessage: true,
        action: 'warn',
        verdict: 'spam',
        reason: 'Слишком много восклицательных знаков: 7',
        muteSeconds: 0,
        warnings: 1,
        threshold: 3,
        notice:
          '⚠️ @tester, предупреждение 1/3. Причина: Слишком много восклицательных знаков: 7',
      });
      expect((await store.getWarnings(key)).data).toBe(1);
    });

    it('should mute on reaching the threshold and reset the counter', async () => {
      await service.plan(spam, config, key);
      await service.plan(spam, config, key);
      const plan = await service.plan(spam, config, key);

      expect(plan.action).toBe('mute');
      expect(plan.muteSeconds).toBe(300);
      expect(plan.warnings).toBe(0);
      expect(plan.notice).toBe(
        '🔇 вы ограничены на 5 мин. Причина: Слишком много восклицательных знаков: 7',
      );
      expect((await store.getWarnings(key)).data).toBe(0);
    });

    it('should start counting again after a mute', async () => {
      for (let i = 0; i < 3; i++) {
        await service.plan(spam, config, key);
      }

      const plan = await service.plan(spam, config, key);

      expect(plan.action).toBe('warn');
      expect(plan.warnings).toBe(1);
    });

    it('should never mute when mute_duration is 0', async () => {
      const noMute = { warn_threshold: 1, mute_duration: 0 };

      await service.plan(spam, noMute, key);
      const plan = await service.plan(spam, noMute, key);

      expect(plan.action).toBe('warn');
      expect(plan.warnings).toBe(2);
      expect(plan.notice).toBe(
        '⚠️ предупреждение. Причина: Слишком много восклицательных знаков: 7',
      );
    });

    it('should fall back to the verdict label without a reason', async () => {
      const plan = await service.plan({ verdict: 'advertisement' }, config, key);

      expect(plan.notice).toBe('⚠️ предупреждение 1/3. Причина: реклама');
    });

    it('should keep counters per user', async () => {
      await service.plan(spam, config, key);
      const plan = await service.plan(spam, config, { ...key, user_id: '43' });

      expect(plan.warnings).toBe(1);
    });

    it('should log every action', async () => {
      await service.plan(spam, config, key);
      await service.plan(spam, config, key);
      await service.plan(spam, config, key);

      const count = await store.countActions(BOT_ID, CHAT_ID, new Date(0));
      expect(count.data).toBe(3);
    });

    it('should count concurrent violations without losing any', async () => {
      const [first, second] = await Promise.all([
        service.plan(spam, config, key),
        service.plan(spam, config, key),
      ]);
      const third = await service.plan(spam, config, key);

      expect([first.warnings, second.warnings].sort()).toEqual([1, 2]);
      expect(third.action).toBe('mute');
      expect((await store.getWarnings(key)).data).toBe(0);
    });

    it('should reset the counter only when muting is enabled', async () => {
      const addWarning = jest.spyOn(store, 'addWarning');

      await service.plan(spam, config, key);
      await service.plan(spam, { warn_threshold: 3, mute_duration: 0 }, key);

      expect(addWarning.mock.calls).toEqual([
        [key, 3],
        [key, undefined],
      ]);
    });

    it('should raise DatabaseError when the counter cannot be updated', async () => {
      const failing: ModerationStore = {
        recordAction: jest.fn(),
        countActions: jest.fn(),
        getWarnings: jest.fn(),
        addWarning: jest.fn().mockResolvedValue({ success: false, error: 'down' }),
        purgeWarnings: jest.fn(),
      };

      await expect(
        new ModerationService(failing).plan(spam, config, key),
      ).rejects.toThrow(DatabaseError);
      expect(failing.recordAction).not.toHaveBeenCalled();
    });

    it('should still return a plan when the action log fails', async () => {
      const failing: ModerationStore = {
        recordAction: jest.fn().mockResolvedValue({ success: false, error: 'down' }),
        countActions: jest.fn(),
        getWarnings: jest.fn(),
        addWarning: jest.fn().mockResolvedValue({ success: true, data: 1 }),
        purgeWarnings: jest.fn(),
      };

      const plan = await new ModerationService(failing).plan(spam, config, key);

      expect(plan.action).toBe('warn');
    });
  });

  describe('purgeExpiredWarnings', () => {
    it('should purge counters older than the TTL', async () => {
      await store.addWarning(key);
      await store.addWarning(key);
      const later = new Date(Date.now() + 25 * 60 * 60 * 1000);

      await expect(service.purgeExpiredWarnings(24, later)).resolves.toBe(1);
      expect((await store.getWarnings(key)).data).toBe(0);
    });

    it('should keep fresh counters', async () => {
      await store.addWarning(key);
      await store.addWarning(key);

      await expect(service.purgeExpiredWarnings(24)).resolves.toBe(0);
      expect((await store.getWarnings(key)).data).toBe(2);
    });
  });
});
