import { describe, it, expect } from 'vitest';
import { PolitenessController } from '../../src/core/politeness';
import { ALLOW_ALL, type RobotsFetcher, type RobotsPolicy, policyFromText } from '../../src/core/robots';

class StubRobots implements RobotsFetcher {
  calls: string[] = [];

  constructor(private readonly respond: (origin: string) => Promise<RobotsPolicy>) {}

  fetchPolicy(origin: string): Promise<RobotsPolicy> {
    this.calls.push(origin);
    return this.respond(origin);
  }
}

function virtualClock(start = 0) {
  let now = start;
  const sleeps: number[] = [];
  return {
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
    sleeps,
  };
}

describe('PolitenessController.waitTurn', () => {
  it('queues concurrent callers for one domain delay apart', async () => {
    const clock = virtualClock(10_000);
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 2, now: clock.now, sleep: clock.sleep });

    const slots = await Promise.all([
      politeness.waitTurn('https://x.test/a/1'),
      politeness.waitTurn('https://x.test/a/2'),
      politeness.waitTurn('https://x.test/a/3'),
    ]);

    expect(slots).toEqual([10_000, 12_000, 14_000]);
    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(politeness.lastDispatch('x.test')).toBe(14_000);
  });

  it('sleeps again when a timer fires early', async () => {
    let now = 0;
    const sleeps: number[] = [];
    // sleeps longer than 10 ms come back 10 ms short
    const earlySleep = async (ms: number) => {
      sleeps.push(ms);
      now += ms > 10 ? ms - 10 : ms;
    };
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 1, now: () => now, sleep: earlySleep });

    const slots = await Promise.all([politeness.waitTurn('https://x.test/a'), politeness.waitTurn('https://x.test/b')]);

    expect(slots).toEqual([0, 1000]);
    expect(sleeps).toEqual([1000, 10]);
  });

  it('keeps real dispatches at least the delay apart', async () => {
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 0.05 });

    const slots = await Promise.all(
      Array.from({ length: 8 }, (_, i) => politeness.waitTurn(`https://x.test/page/${i}`))
    );

    const gaps = slots.slice(1).map((slot, i) => slot - slots[i]);
    expect(Math.min(...gaps)).toBeGreaterThanOrEqual(50);
  });

  it('does not delay other domains', async () => {
    const clock = virtualClock(0);
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 5, now: clock.now, sleep: clock.sleep });

    await politeness.waitTurn('https://x.test/a');
    await politeness.waitTurn('https://y.test/a');

    expect(clock.sleeps).toEqual([]);
    expect(politeness.lastDispatch('y.test')).toBe(0);
  });

  it('only waits for the remainder of the delay', async () => {
    const clock = virtualClock(0);
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 2, now: clock.now, sleep: clock.sleep });

    await politeness.waitTurn('https://x.test/a');
    clock.advance(500);
    const second = await politeness.waitTurn('https://x.test/b');
    clock.advance(5000);
    const third = await politeness.waitTurn('https://x.test/c');

    expect(clock.sleeps).toEqual([1500]);
    expect(second).toBe(2000);
    expect(third).toBe(7000);
  });

  it('keeps the per-domain dispatch time non-decreasing', async () => {
    const clock = virtualClock(0);
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 1, now: clock.now, sleep: clock.sleep });

    const seen: number[] = [];
    for (let i = 0; i < 5; i++) {
      await Promise.all([politeness.waitTurn('https://x.test/p'), politeness.waitTurn('https://x.test/q')]);
      const last = politeness.lastDispatch('x.test');
      if (last !== undefined) seen.push(last);
    }

    for (let i = 1; i < seen.length; i++) {
      expect(seen[i]).toBeGreaterThanOrEqual(seen[i - 1]);
    }
  });

  it('never sleeps with a zero delay', async () => {
    const clock = virtualClock(0);
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 0, now: clock.now, sleep: clock.sleep });

    await Promise.all([politeness.waitTurn('https://x.test/a'), politeness.waitTurn('https://x.test/b')]);

    expect(clock.sleeps).toEqual([]);
  });
});

describe('PolitenessController.allowed', () => {
  it('skips robots.txt entirely when not obeying it', async () => {
    const robots = new StubRobots(async () => policyFromText('https://x.test', 'User-agent: *\nDisallow: /'));
    const politeness = new PolitenessController({ obeyRobots: false, delaySeconds: 0, robots });

    expect(await politeness.allowed('https://x.test/a')).toBe(true);
    expect(robots.calls).toEqual([]);
  });

  it('applies the robots.txt rules of the URL origin', async () => {
    const robots = new StubRobots(async (origin) =>
      policyFromText(origin, 'User-agent: *\nDisallow: /private\n')
    );
    const politeness = new PolitenessController({ obeyRobots: true, delaySeconds: 0, robots });

    expect(await politeness.allowed('https://x.test/private/page')).toBe(false);
    expect(await politeness.allowed('https://x.test/public/page')).toBe(true);
    expect(robots.calls).toEqual(['https://x.test']);
  });

  it('fetches robots.txt once per origin even for concurrent first lookups', async () => {
    const robots = new StubRobots(async () => ALLOW_ALL);
    const politeness = new PolitenessController({ obeyRobots: true, delaySeconds: 0, robots });

    await Promise.all([
      politeness.allowed('https://x.test/a'),
      politeness.allowed('https://x.test/b'),
      politeness.allowed('https://y.test/a'),
    ]);

    expect(robots.calls).toEqual(['https://x.test', 'https://y.test']);
  });

  it('fails open when robots.txt cannot be fetched', async () => {
    const robots = new StubRobots(async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const politeness = new PolitenessController({ obeyRobots: true, delaySeconds: 0, robots });

    expect(await politeness.allowed('https://x.test/a')).toBe(true);
    expect(await politeness.allowed('https://x.test/b')).toBe(true);
    expect(robots.calls).toEqual(['https://x.test']);
  });
});
