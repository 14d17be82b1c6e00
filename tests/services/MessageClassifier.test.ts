/**
 * MessageClassifier unit tests
 */

import {
  classify,
  createPatternAdvertisementPredicate,
  MAX_EXCLAMATION_MARKS,
} from '../../src/services/MessageClassifier';

describe('MessageClassifier', () => {
  const config = {
    blocked_words: ['дурак', 'Scam'],
    max_message_length: 1000,
  };

  describe('spam', () => {
    it('should flag text longer than max_message_length', () => {
      const decision = classify('a'.repeat(1001), config);

      expect(decision).toEqual({
        verdict: 'spam',
        reason: 'Сообщение слишком длинное: 1001 символов',
      });
    });

    it('should accept text of exactly max_message_length', () => {
      expect(classify('a'.repeat(1000), config).verdict).toBe('ok');
    });

    it('should count emoji as one character each', () => {
      expect(classify('😀'.repeat(600), config).verdict).toBe('ok');
      expect(classify('😀'.repeat(1001), config)).toEqual({
        verdict: 'spam',
        reason: 'Сообщение слишком длинное: 1001 символов',
      });
    });

    it('should flag more than five exclamation marks', () => {
      const decision = classify('Купи!!! Сейчас!!!', config);

      expect(decision).toEqual({
        verdict: 'spam',
        reason: 'Слишком много восклицательных знаков: 6',
      });
    });

    it('should allow exactly five exclamation marks', () => {
      const text = `Ура${'!'.repeat(MAX_EXCLAMATION_MARKS)}`;
      expect(classify(text, config).verdict).toBe('ok');
    });

    it('should check length before blocked words', () => {
      const text = `дурак ${'x'.repeat(1000)}`;
      expect(classify(text, config).verdict).toBe('spam');
    });
  });

  describe('offensive', () => {
    it('should match blocked words case-insensitively as substrings', () => {
      const decision = classify('Ты ДУРАКИ все', config);

      expect(decision).toEqual({
        verdict: 'offensive',
        reason: 'Запрещенные слова: дурак',
      });
    });

    it('should never return ok for a text containing a blocked word', () => {
      for (const text of ['scam', 'this is a SCAM', 'scammer here', 'xScAmx']) {
        expect(classify(text, config).verdict).toBe('offensive');
      }
    });

    it('should list at most three blocked words in the reason', () => {
      const decision = classify('aa bb cc dd', {
        blocked_words: ['aa', 'bb', 'cc', 'dd'],
        max_message_length: 1000,
      });

      expect(decision.reason).toBe('Запрещенные слова: aa, bb, cc');
    });
  });

  describe('advertisement', () => {
    it('should never flag advertisements without a predicate', () => {
      expect(classify('Подписывайтесь на t.me/channel', config).verdict).toBe('ok');
    });

    it('should use the injected predicate', () => {
      const isAdvertisement = jest.fn((text: string) => text.includes('промокод'));

      const decision = classify('Лучший промокод тут', config, { isAdvertisement });

      expect(decision).toEqual({ verdict: 'advertisement', reason: 'Реклама' });
      expect(isAdvertisement).toHaveBeenCalledWith('Лучший промокод тут');
    });

    it('should not consult the predicate when a blocked word already matched', () => {
      const isAdvertisement = jest.fn(() => true);

      expect(classify('scam', config, { isAdvertisement }).verdict).toBe('offensive');
      expect(isAdvertisement).not.toHaveBeenCalled();
    });
  });

  describe('createPatternAdvertisementPredicate', () => {
    it('should match any of the patterns', () => {
      const predicate = createPatternAdvertisementPredicate([
        /t\.me\/\w+/i,
        /скидк/i,
      ]);

      expect(predicate('join t.me/deals')).toBe(true);
      expect(predicate('Большие СКИДКИ')).toBe(true);
      expect(predicate('обычное сообщение')).toBe(false);
    });

    it('should give the same answer on repeated calls with global patterns', () => {
      const predicate = createPatternAdvertisementPredicate([/promo/g]);

      expect(predicate('promo')).toBe(true);
      expect(predicate('promo')).toBe(true);
    });

    it('should never match without patterns', () => {
      expect(createPatternAdvertisementPredicate([])('anything')).toBe(false);
    });
  });
});
