import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import {
  BufferedProgressLogger,
  createConcurrentProgressLogger,
  createProgressLogger,
  DEFAULT_BUFFER_THRESHOLD,
  Mutex,
  progressOptionsFromEnv,
  type ConcurrentSettings,
  type ProgressRuntime,
  type ProgressUpdater,
} from '@pacer/progress';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { SmashCommandOptions, SmashMode, SmashParams } from './smash-utils.js';
import { buildProgressSettings, buildSmashParams, splitItems } from './smash-utils.js';

/**
 * Outcome of one smash run.
 */
export interface SmashSummary {
  mode: SmashMode;
  items: number;
  workers: number;
  counted: number;
  elapsedMs: number | undefined;
}

/** Items a worker handles before letting the other workers run. */
const YIELD_EVERY = 1024;

async function smashChunk(updater: ProgressUpdater, items: number): Promise<void> {
  for (let i = 1; i <= items; i++) {
    updater.update();
    if (i % YIELD_EVERY === 0) {
      await yieldToEventLoop();
    }
  }
}

/**
 * Handler for the smash command.
 * Runs a synthetic workload through the progress logger the mode asks for.
 */
export class SmashHandler {
  constructor(
    private readonly runtime: ProgressRuntime = {},
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Execute the smash command.
   */
  async execute(options: SmashCommandOptions): Promise<Result<SmashSummary, Error>> {
    const paramsResult = buildSmashParams(options);
    if (paramsResult.isErr()) {
      return err(paramsResult.error);
    }

    const envResult = progressOptionsFromEnv(this.env);
    if (envResult.isErr()) {
      return err(envResult.error);
    }

    const params = paramsResult.value;
    const settings = buildProgressSettings(params, envResult.value);

    switch (params.mode) {
      case 'single':
      case 'light':
        return this.smashSingle(params, settings);
      case 'concurrent':
        return this.smashConcurrent(params, settings);
      case 'buffered':
        return this.smashBuffered(params, settings);
    }
  }

  private smashSingle(
    params: SmashParams,
    settings: ConcurrentSettings & { logTarget: string }
  ): Result<SmashSummary, Error> {
    return createProgressLogger(settings, this.runtime).map((pl) => {
      pl.start(`Smashing ${pl.pluralItemName}...`);
      for (let i = 0; i < params.items; i++) {
        if (params.mode === 'light') {
          pl.lightUpdate();
        } else {
          pl.update();
        }
      }
      pl.done();

      return { mode: params.mode, items: params.items, workers: 1, counted: pl.count, elapsedMs: pl.elapsed() };
    });
  }

  private async smashConcurrent(
    params: SmashParams,
    settings: ConcurrentSettings & { logTarget: string }
  ): Promise<Result<SmashSummary, Error>> {
    const created = createConcurrentProgressLogger(settings, this.runtime);
    if (created.isErr()) {
      return err(created.error);
    }

    const cpl = created.value;
    cpl.start(`Smashing with ${params.workers} workers...`);
    await Promise.all(
      splitItems(params.items, params.workers).map((chunk) =>
        cpl.spawn().run((handle) => smashChunk(handle, chunk))
      )
    );
    cpl.done();

    return ok({
      mode: params.mode,
      items: params.items,
      workers: params.workers,
      counted: cpl.count,
      elapsedMs: cpl.elapsed(),
    });
  }

  private async smashBuffered(
    params: SmashParams,
    settings: ConcurrentSettings & { logTarget: string }
  ): Promise<Result<SmashSummary, Error>> {
    const created = createProgressLogger(settings, this.runtime);
    if (created.isErr()) {
      return err(created.error);
    }

    const pl = created.value;
    const shared = new Mutex(pl);
    const threshold = settings.threshold ?? DEFAULT_BUFFER_THRESHOLD;

    pl.start(`Smashing with ${params.workers} workers...`);
    await Promise.all(
      splitItems(params.items, params.workers).map((chunk) =>
        new BufferedProgressLogger(shared, threshold).run((handle) => smashChunk(handle, chunk))
      )
    );
    pl.done();

    return ok({
      mode: params.mode,
      items: params.items,
      workers: params.workers,
      counted: pl.count,
      elapsedMs: pl.elapsed(),
    });
  }
}
