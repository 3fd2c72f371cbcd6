import { createRedisClient, reconnectDelay } from './redis';

describe('Redis session client', () => {
  it('backs off linearly up to two seconds', () => {
    expect(reconnectDelay(1)).toBe(50);
    expect(reconnectDelay(10)).toBe(500);
    expect(reconnectDelay(40)).toBe(2000);
  });

  it('keeps reconnecting however long Redis is away', () => {
    const client = createRedisClient('redis://127.0.0.1:6399');
    try {
      const strategy = client.options.retryStrategy;
      expect(strategy).toBeDefined();
      for (const attempt of [1, 5, 6, 100, 10000]) {
        expect(strategy?.(attempt)).toBe(reconnectDelay(attempt));
      }
      // lazyConnect: nothing was opened, and the client is not closed for good
      expect(client.status).toBe('wait');
    } finally {
      client.disconnect();
    }
  });
});
