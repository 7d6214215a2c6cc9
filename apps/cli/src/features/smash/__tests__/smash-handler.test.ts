import { createLoggerRegistry, MemorySink } from '@pacer/logger';
import { ConfigValidationError, ManualClock } from '@pacer/progress';
import { describe, expect, it } from 'vitest';

import { SmashHandler } from '../smash-handler.js';

function createHandler(env: NodeJS.ProcessEnv = {}) {
  const sink = new MemorySink();
  const handler = new SmashHandler(
    { clock: new ManualClock(), logging: createLoggerRegistry({ sinks: [sink] }) },
    env
  );
  return { sink, handler };
}

describe('SmashHandler', () => {
  it('should smash items through a single logger', async () => {
    const { sink, handler } = createHandler();

    const result = await handler.execute({ items: '10', mode: 'single' });

    expect(result._unsafeUnwrap()).toEqual({ mode: 'single', items: 10, workers: 1, counted: 10, elapsedMs: 0 });
    expect(sink.messages()).toEqual(['Smashing pumpkins...', 'Completed.', 'Elapsed: 0ms [10 pumpkins]']);
    expect(sink.entries.every((entry) => entry.category === 'smash')).toBe(true);
  });

  it('should count light updates', async () => {
    const { handler } = createHandler();

    const result = await handler.execute({ items: '5', mode: 'light' });

    expect(result._unsafeUnwrap().counted).toBe(5);
  });

  it('should count every item across concurrent workers', async () => {
    const { sink, handler } = createHandler();

    const result = await handler.execute({ items: '4000', mode: 'concurrent', workers: '4', threshold: '64' });

    expect(result._unsafeUnwrap()).toEqual({
      mode: 'concurrent',
      items: 4000,
      workers: 4,
      counted: 4000,
      elapsedMs: 0,
    });
    expect(sink.messages()).toEqual(['Smashing with 4 workers...', 'Completed.', 'Elapsed: 0ms [4,000 pumpkins]']);
  });

  it('should count every item across buffered workers', async () => {
    const { sink, handler } = createHandler();

    const result = await handler.execute({ items: '3001', mode: 'buffered', workers: '3', threshold: '16' });

    expect(result._unsafeUnwrap().counted).toBe(3001);
    expect(sink.messages()).toEqual(['Smashing with 3 workers...', 'Completed.', 'Elapsed: 0ms [3,001 pumpkins]']);
  });

  it('should take defaults from the environment', async () => {
    const { sink, handler } = createHandler({ PROGRESS_ITEM_NAME: 'turnip', PROGRESS_LOG_TARGET: 'farm' });

    await handler.execute({ items: '2' });

    expect(sink.messages()).toEqual(['Smashing turnips...', 'Completed.', 'Elapsed: 0ms [2 turnips]']);
    expect(sink.entries.every((entry) => entry.category === 'farm')).toBe(true);
  });

  it('should reject invalid options', async () => {
    const { sink, handler } = createHandler();

    const result = await handler.execute({ mode: 'hammer' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Invalid mode: "hammer". Must be one of single, light, concurrent, buffered.');
    }
    expect(sink.entries).toHaveLength(0);
  });

  it('should reject an invalid environment', async () => {
    const { handler } = createHandler({ PROGRESS_LOG_INTERVAL_MS: 'soon' });

    const result = await handler.execute({ items: '1' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigValidationError);
    }
  });
});
