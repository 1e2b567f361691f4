import { describe, expect, it } from 'vitest';
import { RateLimiter } from '@/application/services/RateLimiter';

/**
 * 単体テスト: RateLimiter
 *
 * - 60 秒のスライディングウィンドウ
 * - 許可済みで未記録のブロードキャストも枠として数える
 */
describe('RateLimiter', () => {
  function createLimiter(max: number) {
    let current = 0;
    const limiter = new RateLimiter(max, () => current);
    return {
      limiter,
      setNow: (ms: number) => {
        current = ms;
      },
    };
  }

  it('記録が上限未満なら許可する', () => {
    const { limiter } = createLimiter(2);

    expect(limiter.admit()).toBe(true);
    limiter.record();
    expect(limiter.admit()).toBe(true);
  });

  it('60 秒以内に上限に達したら M+1 回目を拒否する', () => {
    const { limiter, setNow } = createLimiter(3);
    for (const at of [0, 10_000, 20_000]) {
      setNow(at);
      expect(limiter.admit()).toBe(true);
      limiter.record();
    }

    setNow(59_999);

    expect(limiter.admit()).toBe(false);
  });

  it('最も古い記録から 60 秒経つと再び許可する', () => {
    const { limiter, setNow } = createLimiter(2);
    limiter.record(0);
    limiter.record(30_000);

    setNow(59_999);
    expect(limiter.admit()).toBe(false);

    setNow(60_000);
    expect(limiter.admit()).toBe(true);
    expect(limiter.windowSize).toBe(1);
  });

  it('判定のたびに古い記録を捨てる', () => {
    const { limiter, setNow } = createLimiter(5);
    limiter.record(0);
    limiter.record(1_000);

    setNow(120_000);
    limiter.admit();

    expect(limiter.windowSize).toBe(0);
  });

  it('許可済みで記録前のブロードキャストも上限に数える', () => {
    const { limiter } = createLimiter(1);

    expect(limiter.admit()).toBe(true);
    expect(limiter.pending).toBe(1);
    expect(limiter.admit()).toBe(false);

    limiter.record();

    expect(limiter.pending).toBe(0);
    expect(limiter.windowSize).toBe(1);
    expect(limiter.admit()).toBe(false);
  });

  it('release() は記録せずに確保した枠を返す', () => {
    const { limiter } = createLimiter(1);
    limiter.admit();

    limiter.release();

    expect(limiter.windowSize).toBe(0);
    expect(limiter.admit()).toBe(true);
  });
});
