/**
 * Batch runner
 *
 * Runs named stages in order over one input. The first failing stage aborts the
 * batch: its error is rethrown as PIPELINE_ABORTED naming the stage, and
 * nothing computed by earlier stages is returned.
 */

import { CaliperError, ErrorCode, wrapError } from '../core/errors';
import { Logger, defaultLogger } from '../core/logging';

export class AnalysisPipeline<TInput, TOutput> {
  private constructor(
    private readonly names: readonly string[],
    private readonly execute: (input: TInput) => TOutput,
    private readonly logger: Logger
  ) {}

  /**
   * Start a pipeline whose first stage receives a `TInput`
   */
  static start<T>(logger: Logger = defaultLogger()): AnalysisPipeline<T, T> {
    return new AnalysisPipeline<T, T>([], (input) => input, logger.child('pipeline'));
  }

  /**
   * Append a stage; returns a new pipeline, this one is unchanged
   */
  stage<TNext>(name: string, run: (input: TOutput) => TNext): AnalysisPipeline<TInput, TNext> {
    if (this.names.includes(name)) {
      throw new CaliperError(ErrorCode.INVALID_CONFIG, `Duplicate stage name '${name}'`, {
        stage: name,
      });
    }

    const previous = this.execute;
    const logger = this.logger;
    const execute = (input: TInput): TNext => {
      const value = previous(input);
      const started = Date.now();
      try {
        const next = run(value);
        logger.debug(`${name} finished in ${Date.now() - started}ms`);
        return next;
      } catch (error) {
        throw abort(name, error, logger);
      }
    };

    return new AnalysisPipeline<TInput, TNext>([...this.names, name], execute, logger);
  }

  get stageNames(): string[] {
    return [...this.names];
  }

  /**
   * @throws CaliperError PIPELINE_ABORTED wrapping the failing stage's error
   */
  run(input: TInput): TOutput {
    return this.execute(input);
  }
}

function abort(stage: string, error: unknown, logger: Logger): CaliperError {
  const cause = wrapError(error);
  logger.error(`stage '${stage}' failed: ${cause.message}`);
  return new CaliperError(ErrorCode.PIPELINE_ABORTED, `Stage '${stage}' failed: ${cause.message}`, {
    ...cause.context,
    stage,
    cause: cause.code,
  });
}
