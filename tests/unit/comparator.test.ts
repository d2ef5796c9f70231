import {
  compareBody,
  compareChannel,
  compareCta,
  compareNextAction,
  compareOutput,
  compareSubject,
} from '../../src/evaluation/comparator';
import { readAction, readMessage, readOutput } from '../../src/evaluation/record-views';
import { lexicon } from '../helpers';

describe('Comparator', () => {
  describe('compareChannel', () => {
    it('should pass on an exact channel match', () => {
      const result = compareChannel(readMessage({ channel: 'sms' }), readMessage({ channel: 'sms' }));
      expect(result.status).toBe('passed');
      expect(result.name).toBe('channel_match');
    });

    it('should fail on a mismatch', () => {
      const result = compareChannel(readMessage({ channel: 'sms' }), readMessage({ channel: 'email' }));
      expect(result.status).toBe('failed');
      expect(result.message).toBe("Channel: expected 'sms', got 'email'");
    });

    it('should treat null, empty and "none" channels as the same no-message sentinel', () => {
      expect(compareChannel(readMessage({ channel: null }), readMessage({ channel: 'none' })).status).toBe('passed');
      expect(compareChannel(readMessage({ channel: '' }), readMessage(null)).status).toBe('passed');
    });

    it('should fail when a message was expected but none was sent', () => {
      const result = compareChannel(readMessage({ channel: 'sms' }), readMessage(null));
      expect(result.status).toBe('failed');
      expect(result.message).toBe("Channel: expected 'sms', got 'none'");
    });
  });

  describe('compareSubject', () => {
    const expected = readMessage({ channel: 'email', subject: 'Welcome home' });

    it('should pass an identical subject', () => {
      const result = compareSubject(expected, readMessage({ channel: 'email', subject: 'Welcome home' }), lexicon);
      expect(result?.status).toBe('passed');
      expect(result?.message).toBe('Subject similarity: 100.00%');
    });

    it('should fail when the expected subject is missing from the output', () => {
      const result = compareSubject(expected, readMessage({ channel: 'email' }), lexicon);
      expect(result?.status).toBe('failed');
      expect(result?.message).toBe("Subject missing: expected 'Welcome home'");
    });

    it('should not apply to SMS-like channels', () => {
      const sms = readMessage({ channel: 'sms', subject: 'Ignored' });
      expect(compareSubject(sms, readMessage({ channel: 'sms' }), lexicon)).toBeNull();
    });

    it('should not apply without an expected subject', () => {
      expect(compareSubject(readMessage({ channel: 'email' }), readMessage({ channel: 'email', subject: 'x' }), lexicon)).toBeNull();
    });
  });

  describe('compareBody', () => {
    it('should pass when both bodies are null', () => {
      const result = compareBody(readMessage({ body: null }), readMessage({ body: null }));
      expect(result.status).toBe('passed');
      expect(result.message).toBe('Both bodies are null (no message sent)');
    });

    it('should fail when only the expected body is null', () => {
      const result = compareBody(readMessage({ body: null }), readMessage({ body: 'Hello' }));
      expect(result.status).toBe('failed');
      expect(result.message).toBe('Body: expected no message, got a message body');
    });

    it('should fail when only the actual body is null', () => {
      const result = compareBody(readMessage({ body: 'Hello' }), readMessage({}));
      expect(result.status).toBe('failed');
      expect(result.message).toBe('Body: expected a message body, got none');
    });

    it('should pass identical bodies at 100%', () => {
      const result = compareBody(readMessage({ body: 'Hi Sam, welcome!' }), readMessage({ body: 'Hi Sam, welcome!' }));
      expect(result.status).toBe('passed');
      expect(result.message).toBe('Body similarity: 100.00%');
      expect(result.similarity).toBe(1);
    });

    it('should warn at the 0.70 lower edge of the warning band', () => {
      const result = compareBody(readMessage({ body: 'abcdefghij' }), readMessage({ body: 'abcdefgxyz' }));
      expect(result.status).toBe('warning');
      expect(result.message).toBe('Body similarity: 70.00%');
    });

    it('should fail below 0.70', () => {
      const result = compareBody(readMessage({ body: 'abcd' }), readMessage({ body: 'wxyz' }));
      expect(result.status).toBe('failed');
      expect(result.message).toBe('Body similarity: 0.00%');
    });
  });

  describe('compareCta', () => {
    it('should emit no check without an expected CTA', () => {
      expect(compareCta(readMessage({}), readMessage({ cta: { type: 'call' } }))).toBeNull();
    });

    it('should fail a mismatched CTA type', () => {
      const result = compareCta(readMessage({ cta: { type: 'book_tour' } }), readMessage({ cta: { type: 'call' } }));
      expect(result?.status).toBe('failed');
      expect(result?.message).toBe("CTA type: expected 'book_tour', got 'call'");
    });

    it('should fail a missing actual CTA', () => {
      const result = compareCta(readMessage({ cta: { type: 'book_tour' } }), readMessage({}));
      expect(result?.message).toBe("CTA type: expected 'book_tour', got 'none'");
    });
  });

  describe('compareNextAction', () => {
    it('should pass a matching type regardless of value', () => {
      const result = compareNextAction(
        readAction({ type: 'wait', value: '2d' }),
        readAction({ type: 'wait', value: '3d' }),
      );
      expect(result?.status).toBe('passed');
    });

    it('should fail a mismatch', () => {
      const result = compareNextAction(readAction({ type: 'wait' }), readAction({ type: 'handoff' }));
      expect(result?.status).toBe('failed');
      expect(result?.message).toBe("Next action: expected 'wait', got 'handoff'");
    });

    it('should emit no check without an expected action', () => {
      expect(compareNextAction(readAction(null), readAction({ type: 'wait' }))).toBeNull();
    });
  });

  describe('compareOutput', () => {
    it('should emit checks in report order', () => {
      const expected = {
        message: readMessage({ channel: 'email', subject: 'Hi', body: 'Hello', cta: { type: 'reply' } }),
        action: readAction({ type: 'wait' }),
      };
      const actual = readOutput({
        next_message: { channel: 'email', subject: 'Hi', body: 'Hello', cta: { type: 'reply' } },
        next_action: { type: 'wait' },
      });
      expect(compareOutput(expected, actual, lexicon).map((c) => c.name)).toEqual([
        'channel_match',
        'subject_match',
        'body_similarity',
        'cta_type_match',
        'next_action_type_match',
      ]);
    });

    it('should return frozen check results', () => {
      const [first] = compareOutput(
        { message: readMessage(null), action: readAction(null) },
        readOutput(null),
        lexicon,
      );
      expect(Object.isFrozen(first)).toBe(true);
    });
  });
});
