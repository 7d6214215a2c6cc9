import { createLoggerRegistry, MemorySink, type Sink } from '@pacer/logger';
import { describe, expect, it, vi } from 'vitest';

import { ManualClock } from '../clock.js';
import { ConcurrentProgressLogger } from '../concurrent-progress-logger.js';
import { LockReentryError } from '../mutex.js';
import { ProgressLogger, type ProgressLoggerOptions } from '../progress-logger.js';

function setup(options: ProgressLoggerOptions = {}, threshold = 10, mergeMask?: number) {
  const clock = new ManualClock();
  const sink = new MemorySink();
  const logging = createLoggerRegistry({ sinks: [sink] });
  const inner = new ProgressLogger({ logTarget: 'test', clock, logging, ...options });
  const cpl = ConcurrentProgressLogger.wrap(inner, { threshold, mergeMask });
  return { clock, sink, inner, cpl };
}

function tick(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(() => resolve()));
}

async function smash(handle: ConcurrentProgressLogger, updates: number, light = false): Promise<void> {
  for (let i = 0; i < updates; i++) {
    if (light) {
      handle.lightUpdate();
    } else {
      handle.update();
    }
    if (i % 10 === 0) {
      await tick();
    }
  }
}

describe('ConcurrentProgressLogger', () => {
  describe('buffering', () => {
    it('keeps updates local until the threshold is reached', () => {
      const { cpl } = setup();

      cpl.start();
      for (let i = 0; i < 9; i++) {
        cpl.update();
      }

      expect(cpl.count).toBe(0);
      expect(cpl.buffered).toBe(9);

      cpl.update();

      expect(cpl.count).toBe(10);
      expect(cpl.buffered).toBe(0);
    });

    it('merges a large count at once', () => {
      const { cpl } = setup();

      cpl.start();
      cpl.updateWithCount(25);

      expect(cpl.count).toBe(25);
      expect(cpl.buffered).toBe(0);
    });

    it('merges with the time read before taking the lock', () => {
      const { clock, inner, cpl } = setup();
      const spy = vi.spyOn(inner, 'updateWithCountAndTime');

      cpl.start();
      clock.set(250);
      cpl.updateWithCount(10);

      expect(spy).toHaveBeenCalledWith(10, 250);
    });

    it('uses the explicit time of updateWithCountAndTime', () => {
      const { inner, cpl } = setup();
      const spy = vi.spyOn(inner, 'updateWithCountAndTime');

      cpl.start();
      cpl.updateWithCountAndTime(4, 100);
      cpl.updateWithCountAndTime(6, 300);

      expect(spy).toHaveBeenCalledOnce();
      expect(spy).toHaveBeenCalledWith(10, 300);
    });

    it('applies a threshold to one handle only', () => {
      const { cpl } = setup();

      cpl.start();
      const eager = cpl.spawn().threshold(1);
      const lazy = cpl.spawn();
      eager.update();
      lazy.update();

      expect(cpl.count).toBe(1);
      expect(lazy.buffered).toBe(1);
    });
  });

  describe('flush', () => {
    it('makes buffered updates visible and runs the shared throttle', () => {
      const { clock, sink, cpl } = setup({ logInterval: 1000 });

      cpl.start();
      const handle = cpl.spawn();
      handle.updateWithCount(3);
      clock.advance(1500);
      handle.flush();

      expect(cpl.count).toBe(3);
      expect(handle.buffered).toBe(0);
      expect(sink.messages()).toEqual(['3 items, 1s, 2.00 items/s, 500.00 ms/item']);

      clock.advance(1500);
      handle.flush();

      expect(sink.messages()).toEqual([
        '3 items, 1s, 2.00 items/s, 500.00 ms/item',
        '3 items, 3s, 1.00 items/s, 1.00 s/item',
      ]);
    });

    it('checks the throttle even with an empty buffer', () => {
      const { clock, inner, cpl } = setup();
      const spy = vi.spyOn(inner, 'updateWithCountAndTime');

      cpl.start();
      clock.set(42);
      cpl.flush();

      expect(spy).toHaveBeenCalledWith(0, 42);
    });
  });

  describe('handles', () => {
    it('never copies the buffer into a new handle', () => {
      const { cpl } = setup();

      cpl.start();
      const handle = cpl.spawn();
      handle.updateWithCount(3);
      const copy = handle.clone();

      expect(copy.buffered).toBe(0);

      handle.flush();
      copy.flush();

      expect(cpl.count).toBe(3);
    });

    it('counts every update from concurrent workers exactly once', async () => {
      for (let round = 0; round < 5; round++) {
        const { cpl } = setup({}, 64);

        cpl.start();
        await Promise.all([0, 1, 2, 3].map(() => cpl.spawn().run((handle) => smash(handle, 1000))));

        expect(cpl.count).toBe(4000);
      }
    });

    it('counts light updates from concurrent workers exactly once', async () => {
      const { cpl } = setup({}, 64, 7);

      cpl.start();
      await Promise.all([0, 1, 2, 3].map(() => cpl.spawn().run((handle) => smash(handle, 1000, true))));

      expect(cpl.count).toBe(4000);
    });

    it('flushes when synchronous work throws', () => {
      const { cpl } = setup();
      cpl.start();
      const handle = cpl.spawn();

      expect(() =>
        handle.run((h) => {
          h.update();
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(cpl.count).toBe(1);
    });

    it('flushes when asynchronous work rejects', async () => {
      const { cpl } = setup();
      cpl.start();

      await expect(
        cpl.spawn().run(async (h) => {
          h.updateWithCount(2);
          await tick();
          throw new Error('rotten');
        })
      ).rejects.toThrow('rotten');
      expect(cpl.count).toBe(2);
    });

    it('returns the value of the work it runs', () => {
      const { cpl } = setup();

      const result = cpl.spawn().run((h) => {
        h.update();
        return 'smashed';
      });

      expect(result).toBe('smashed');
    });
  });

  describe('lightUpdate', () => {
    it('merges on calls 0, K+1, 2(K+1) of a handle', () => {
      const { inner, cpl } = setup({}, 1_000_000, 3);
      const spy = vi.spyOn(inner, 'updateWithCountAndTime');

      cpl.start();
      for (let i = 0; i < 9; i++) {
        cpl.lightUpdate();
      }

      expect(spy.mock.calls.map(([count]) => count)).toEqual([1, 4, 4]);
      expect(cpl.count).toBe(9);
      expect(cpl.buffered).toBe(0);
    });
  });

  describe('lifecycle', () => {
    it('done merges the caller handle buffer before reporting', () => {
      const { clock, sink, cpl } = setup();

      cpl.start();
      cpl.updateWithCount(5);
      clock.advance(1000);
      cpl.done();

      expect(cpl.count).toBe(5);
      expect(sink.messages()).toEqual(['Completed.', 'Elapsed: 1s [5 items, 5.00 items/s, 200.00 ms/item]']);
    });

    it('stop merges the caller handle buffer', () => {
      const { cpl } = setup();

      cpl.start();
      cpl.updateWithCount(5);
      cpl.stop();

      expect(cpl.count).toBe(5);
      expect(cpl.buffered).toBe(0);
    });

    it('doneWithCount discards the buffer', () => {
      const { cpl } = setup();

      cpl.start();
      cpl.updateWithCount(5);
      cpl.doneWithCount(100);

      expect(cpl.count).toBe(100);
      expect(cpl.buffered).toBe(0);
    });

    it('ignores merges after the shared logger stopped', () => {
      const { cpl } = setup();

      cpl.start();
      const late = cpl.spawn();
      cpl.done();
      late.updateWithCount(20);

      expect(cpl.count).toBe(0);
    });

    it('drops the caller buffer on start', () => {
      const { cpl } = setup();

      cpl.updateWithCount(5);
      cpl.start();
      cpl.flush();

      expect(cpl.count).toBe(0);
    });

    it('updateAndDisplay merges and logs', () => {
      const { sink, cpl } = setup();

      cpl.start();
      cpl.updateWithCount(4);
      cpl.updateAndDisplay();

      expect(sink.messages()).toEqual(['5 items, 0ms']);
      expect(cpl.buffered).toBe(0);
    });

    it('updateAndDisplay logs once when the interval has already passed', () => {
      const { clock, sink, cpl } = setup({ logInterval: 1000 });

      cpl.start();
      cpl.updateWithCount(4);
      clock.advance(2000);
      cpl.updateAndDisplay();

      expect(sink.messages()).toEqual(['5 items, 2s, 2.50 items/s, 400.00 ms/item']);
      expect(cpl.count).toBe(5);
    });

    it('ignores negative and non-integer counts', () => {
      const { cpl } = setup();

      cpl.start();
      cpl.updateWithCount(5);
      cpl.updateWithCount(-7);
      cpl.updateWithCount(Number.NaN);
      cpl.updateWithCountAndTime(-20, 0);
      cpl.updateAndDisplay(Number.NaN);
      cpl.doneWithCount(-1);

      expect(cpl.buffered).toBe(5);
      expect(cpl.count).toBe(0);

      cpl.flush();

      expect(cpl.count).toBe(5);
    });
  });

  describe('delegation', () => {
    it('configures the shared logger', () => {
      const { inner, cpl } = setup();

      cpl.itemName('pumpkin').logInterval(0).expectedUpdates(20).localSpeed(true).displayMemory(false);

      expect(inner.pluralItemName).toBe('pumpkins');
      expect(inner.options).toMatchObject({ logInterval: 0, expectedUpdates: 20, localSpeed: true });
    });

    it('create builds and wraps a logger from options', () => {
      const clock = new ManualClock();
      const sink = new MemorySink();
      const cpl = ConcurrentProgressLogger.create({
        itemName: 'pumpkin',
        logInterval: 0,
        logTarget: 'test',
        clock,
        logging: createLoggerRegistry({ sinks: [sink] }),
        threshold: 2,
      });

      cpl.start('Smashing pumpkins...');
      cpl.update();
      cpl.update();

      expect(sink.messages()).toEqual(['Smashing pumpkins...', '2 pumpkins, 0ms']);
    });

    it('throws instead of deadlocking when a sink re-enters the lock', () => {
      const holder: { cpl?: ConcurrentProgressLogger } = {};
      const sink: Sink = {
        write: () => {
          void holder.cpl?.count;
        },
        flush: () => undefined,
      };
      const inner = new ProgressLogger({
        logTarget: 'test',
        clock: new ManualClock(),
        logging: createLoggerRegistry({ sinks: [sink] }),
      });
      const cpl = ConcurrentProgressLogger.wrap(inner);
      holder.cpl = cpl;

      expect(() => cpl.start('hello')).toThrow(LockReentryError);
      expect(cpl.count).toBe(0);
    });
  });
});
