/**
 * Gearless vs traditional joint comparison on synthetic test data
 *
 * Generates seeded performance and structural datasets, runs both analyses
 * and prints their markdown reports.
 */

import {
  Logger,
  SampleDataGenerator,
  isCaliperError,
  parseAnalysisConfig,
  renderPerformanceReport,
  renderStructuralReport,
  runPerformanceAnalysis,
  runStructuralAnalysis,
} from '../src';

export function main(): void {
  const config = parseAnalysisConfig({ seed: 7, logLevel: 'info' });
  const logger = new Logger({ level: config.logLevel, scope: 'example' });
  const generator = new SampleDataGenerator(config.seed);

  try {
    const performance = runPerformanceAnalysis(
      generator.performance({ sampleSize: 400 }),
      config,
      { logger }
    );
    console.log(renderPerformanceReport(performance));

    const structural = runStructuralAnalysis(generator.structural(), config, { logger });
    console.log(renderStructuralReport(structural));

    logger.info(
      `candidate improves on ${performance.efficiency.improvedMetrics().length} of ${performance.efficiency.size} overall metrics`
    );
  } catch (error) {
    if (isCaliperError(error)) {
      logger.error(error.toString());
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

main();
