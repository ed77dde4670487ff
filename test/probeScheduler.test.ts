import { setTimeout as sleep } from 'node:timers/promises';

import { describe, expect, it, vi } from 'vitest';

import type { ConnectAttemptOptions, Connector, ConnectorLink } from '../src/probe/connector';
import { selectWorking } from '../src/probe/probeScheduler';
import type { ProbeResult } from '../src/probe/probeScheduler';
import type { ProxyCandidate } from '../src/proxy/proxyLink';

interface ProbePlan {
  /** `null` means the attempt hangs until it is aborted. */
  delayMs: number | null;
  ok: boolean;
}

function candidate(host: string): ProxyCandidate {
  return Object.freeze({ host, port: 443, secret: Buffer.from([0xdd, 0x01]) });
}

class FakeConnector implements Connector {
  public active = 0;
  public maxActive = 0;
  public readonly attempted: string[] = [];
  public readonly aborted: string[] = [];
  public readonly disconnected: string[] = [];

  public constructor(private readonly plans: Record<string, ProbePlan>) {}

  public attemptConnect(target: ProxyCandidate, options: ConnectAttemptOptions): Promise<ConnectorLink> {
    const plan = this.plans[target.host] ?? { delayMs: 0, ok: false };
    this.attempted.push(target.host);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const onAbort = () => {
        clearTimeout(timer);
        this.active -= 1;
        this.aborted.push(target.host);
        reject(new Error(`aborted ${target.host}`));
      };

      if (plan.delayMs !== null) {
        timer = setTimeout(() => {
          options.signal.removeEventListener('abort', onAbort);
          this.active -= 1;
          if (plan.ok) {
            resolve({
              disconnect: () => {
                this.disconnected.push(target.host);
                return Promise.resolve();
              },
            });
          } else {
            reject(new Error(`refused ${target.host}`));
          }
        }, plan.delayMs);
      }

      options.signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

describe('selectWorking', () => {
  it('returns null right away for an empty list', async () => {
    const connector = new FakeConnector({});

    await expect(
      selectWorking([], { concurrency: 5, timeoutMs: 1_000, connector }),
    ).resolves.toBeNull();
    expect(connector.attempted).toEqual([]);
  });

  it('never runs more probes than the concurrency limit', async () => {
    const hosts = Array.from({ length: 10 }, (_, index) => `relay-${index}.example`);
    const connector = new FakeConnector(
      Object.fromEntries(hosts.map((host) => [host, { delayMs: 5, ok: false }])),
    );

    const winner = await selectWorking(hosts.map(candidate), {
      concurrency: 3,
      timeoutMs: 1_000,
      connector,
    });

    expect(winner).toBeNull();
    expect(connector.attempted).toHaveLength(10);
    expect(connector.maxActive).toBe(3);
    expect(connector.active).toBe(0);
  });

  it('returns the single working relay and cancels every other probe first', async () => {
    const connector = new FakeConnector({
      'a.example': { delayMs: null, ok: false },
      'b.example': { delayMs: null, ok: false },
      'c.example': { delayMs: 10, ok: true },
      'd.example': { delayMs: null, ok: false },
      'e.example': { delayMs: null, ok: false },
    });
    const results: ProbeResult[] = [];
    const candidates = ['a', 'b', 'c', 'd', 'e'].map((name) => candidate(`${name}.example`));

    const winner = await selectWorking(candidates, {
      concurrency: 3,
      timeoutMs: 5_000,
      connector,
      onResult: (result) => results.push(result),
    });

    expect(winner).toBe(candidates[2]);
    expect(connector.disconnected).toEqual(['c.example']);
    expect(connector.active).toBe(0);
    expect(connector.aborted).toEqual(expect.arrayContaining(['a.example', 'b.example']));
    expect([...connector.aborted].sort()).toEqual(
      connector.attempted.filter((host) => host !== 'c.example').sort(),
    );
    expect(results).toHaveLength(5);
    expect(results.filter((result) => result.outcome === 'success')).toHaveLength(1);
    expect(results.filter((result) => result.outcome === 'cancelled')).toHaveLength(4);
    expect(connector.attempted).not.toContain('e.example');
  });

  it('reports every failure before returning null', async () => {
    const connector = new FakeConnector({
      'a.example': { delayMs: 5, ok: false },
      'b.example': { delayMs: 15, ok: false },
    });
    const results: ProbeResult[] = [];

    const winner = await selectWorking([candidate('a.example'), candidate('b.example')], {
      concurrency: 2,
      timeoutMs: 1_000,
      connector,
      onResult: (result) => results.push(result),
    });

    expect(winner).toBeNull();
    expect(results.map((result) => [result.candidate.host, result.outcome])).toEqual([
      ['a.example', 'failure'],
      ['b.example', 'failure'],
    ]);
  });

  it('fails a probe that outlives its timeout', async () => {
    const connector = new FakeConnector({ 'slow.example': { delayMs: null, ok: true } });
    const results: ProbeResult[] = [];

    const winner = await selectWorking([candidate('slow.example')], {
      concurrency: 1,
      timeoutMs: 30,
      connector,
      onResult: (result) => results.push(result),
    });

    expect(winner).toBeNull();
    expect(results).toEqual([
      {
        candidate: candidate('slow.example'),
        outcome: 'failure',
        error: 'Probe timed out after 30ms',
      },
    ]);
    expect(connector.active).toBe(0);
  });

  it('finishes in about the time of the fastest success', async () => {
    const connector = new FakeConnector({
      'a.example': { delayMs: null, ok: false },
      'b.example': { delayMs: 20, ok: true },
      'c.example': { delayMs: null, ok: false },
    });
    const startedAt = Date.now();

    const winner = await selectWorking(
      [candidate('a.example'), candidate('b.example'), candidate('c.example')],
      { concurrency: 3, timeoutMs: 400, connector },
    );

    expect(winner?.host).toBe('b.example');
    expect(Date.now() - startedAt).toBeLessThan(300);
  });

  it('closes a link that arrives after its probe was cancelled', async () => {
    const lateDisconnect = vi.fn(() => Promise.resolve());
    const connector: Connector = {
      attemptConnect: (target) => {
        if (target.host === 'fast.example') {
          return Promise.resolve({ disconnect: () => Promise.resolve() });
        }
        // ignores the abort signal on purpose
        return sleep(40).then(() => ({ disconnect: lateDisconnect }));
      },
    };

    const winner = await selectWorking([candidate('stubborn.example'), candidate('fast.example')], {
      concurrency: 2,
      timeoutMs: 1_000,
      connector,
    });

    expect(winner?.host).toBe('fast.example');
    expect(lateDisconnect).not.toHaveBeenCalled();

    await sleep(80);
    expect(lateDisconnect).toHaveBeenCalledTimes(1);
  });

  it('counts a connector that throws as a failure', async () => {
    const connector: Connector = {
      attemptConnect: (target) => {
        if (target.host === 'throws.example') throw new Error('bad endpoint');
        return Promise.resolve({
          disconnect: () => Promise.reject(new Error('reset during close')),
        });
      },
    };
    const results: ProbeResult[] = [];

    const winner = await selectWorking([candidate('throws.example'), candidate('resets.example')], {
      concurrency: 1,
      timeoutMs: 1_000,
      connector,
      onResult: (result) => results.push(result),
    });

    expect(winner?.host).toBe('resets.example');
    expect(results.map((result) => [result.candidate.host, result.outcome, result.error])).toEqual([
      ['throws.example', 'failure', 'bad endpoint'],
      ['resets.example', 'success', undefined],
    ]);
  });

  it('returns within the timeout when the winner never finishes disconnecting', async () => {
    const connector: Connector = {
      attemptConnect: () =>
        Promise.resolve({ disconnect: () => new Promise<void>(() => undefined) }),
    };
    const startedAt = Date.now();

    const winner = await selectWorking([candidate('sticky.example')], {
      concurrency: 1,
      timeoutMs: 50,
      connector,
    });

    expect(winner?.host).toBe('sticky.example');
    expect(Date.now() - startedAt).toBeLessThan(500);
  });

  it('cancels the other probes as soon as the winner connects', async () => {
    const events: string[] = [];
    const connector: Connector = {
      attemptConnect: (target, options) => {
        events.push(`attempt ${target.host}`);
        if (target.host === 'a.example') {
          return sleep(5).then(() => ({
            disconnect: () =>
              sleep(100).then(() => {
                events.push('disconnected a.example');
              }),
          }));
        }
        return new Promise<ConnectorLink>((_resolve, reject) => {
          options.signal.addEventListener(
            'abort',
            () => {
              events.push(`aborted ${target.host}`);
              reject(new Error('aborted'));
            },
            { once: true },
          );
        });
      },
    };

    const winner = await selectWorking(
      [candidate('a.example'), candidate('b.example'), candidate('c.example')],
      { concurrency: 2, timeoutMs: 1_000, connector },
    );

    expect(winner?.host).toBe('a.example');
    expect(events).toEqual([
      'attempt a.example',
      'attempt b.example',
      'aborted b.example',
      'disconnected a.example',
    ]);
  });

  it('keeps going when the result listener throws', async () => {
    const connector = new FakeConnector({
      'a.example': { delayMs: 5, ok: false },
      'b.example': { delayMs: 10, ok: true },
    });

    const winner = await selectWorking([candidate('a.example'), candidate('b.example')], {
      concurrency: 2,
      timeoutMs: 1_000,
      connector,
      onResult: () => {
        throw new Error('listener broke');
      },
    });

    expect(winner?.host).toBe('b.example');
    expect(connector.active).toBe(0);
  });

  it('rejects a non-positive concurrency limit', async () => {
    const connector = new FakeConnector({});

    await expect(
      selectWorking([candidate('a.example')], { concurrency: 0, timeoutMs: 100, connector }),
    ).rejects.toThrowError(RangeError);
  });
});
