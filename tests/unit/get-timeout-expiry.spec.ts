import { defineMachine } from '../../src/engines/state-machine-definition';
import { getTimeoutExpiry } from '../../src/utils/get-timeout-expiry';

const payment = defineMachine({
  id: 'payment',
  states: {
    draft: { initial: true },
    pending: { timeoutMinutes: 3 * 24 * 60 },
    retrying: { timeoutMinutes: 0.5 },
    settled: { terminal: true },
  },
  events: ['submit', 'retry', 'settle'],
  transitions: [
    { from: 'draft', event: 'submit', to: 'pending' },
    { from: 'pending', event: 'retry', to: 'retrying' },
    { from: ['pending', 'retrying'], event: 'settle', to: 'settled' },
  ],
});

describe('getTimeoutExpiry', () => {
  const now = new Date('2026-03-01T12:00:00.000Z');

  it('should add the state timeout to now', () => {
    expect(getTimeoutExpiry(payment, 'pending', now)).toEqual(
      new Date('2026-03-04T12:00:00.000Z'),
    );
  });

  it('should handle fractional minutes', () => {
    expect(getTimeoutExpiry(payment, 'retrying', now)).toEqual(
      new Date('2026-03-01T12:00:30.000Z'),
    );
  });

  it('should return null for a state without a deadline', () => {
    expect(getTimeoutExpiry(payment, 'draft', now)).toBeNull();
    expect(getTimeoutExpiry(payment, 'settled', now)).toBeNull();
  });

  it('should default to the current time', () => {
    const before = Date.now();
    const expiry = getTimeoutExpiry(payment, 'retrying');
    const after = Date.now();

    expect(expiry).not.toBeNull();
    expect(expiry?.getTime()).toBeGreaterThanOrEqual(before + 30_000);
    expect(expiry?.getTime()).toBeLessThanOrEqual(after + 30_000);
  });
});
