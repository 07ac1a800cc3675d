/**
 * Sequential test driver
 * @module driver/runner
 */

import type { ServerConfig } from '../config/index.js';
import { isConformanceError, isErrorKind, wrapError, type ConformanceError } from '../errors/index.js';
import type { FixtureContext } from '../fixtures/index.js';
import { ALL_OPERATIONS, type ConformanceOperation, type OperationVariant } from '../operations/index.js';
import { buildSignedRequest, toHttpRequest } from '../request/index.js';
import { verifyResponse } from '../verify/index.js';
import { formatReport, formatTestLabel } from './format.js';
import type { Reporter, TestPhase, TestReport } from './types.js';

/**
 * Runner options
 */
export interface RunnerOptions {
  /** Operations to test, in order. Defaults to every operation. */
  operations?: readonly ConformanceOperation[];
  reporter?: Reporter;
  /** Signing time source */
  clock?: () => Date;
}

/**
 * A failed phase, carried from the phase that raised it to the report
 */
class PhaseFailure extends Error {
  constructor(
    readonly phase: TestPhase,
    readonly error: ConformanceError,
    readonly variant?: string
  ) {
    super(error.message, { cause: error });
    this.name = 'PhaseFailure';
  }
}

/**
 * Runs each operation's test against the configured server, one at a time.
 *
 * A test stops at its first failure and the run moves on to the next test.
 * A ConfigError stops the run: it is reported, then rethrown.
 *
 * @example
 * ```typescript
 * const runner = new ConformanceRunner(config, fixtures, {
 *   reporter: new ConsoleReporter(),
 * });
 * const reports = await runner.run();
 * ```
 */
export class ConformanceRunner {
  private readonly operations: readonly ConformanceOperation[];
  private readonly clock: () => Date;

  constructor(
    private readonly config: ServerConfig,
    private readonly fixtures: FixtureContext,
    private readonly options: RunnerOptions = {}
  ) {
    this.operations = options.operations ?? ALL_OPERATIONS;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Runs every test and returns their reports in run order
   *
   * @throws ConfigError if any test hit one
   */
  async run(): Promise<TestReport[]> {
    const reports: TestReport[] = [];
    const total = this.operations.length;

    for (const [i, operation] of this.operations.entries()) {
      const report = await this.runTest(operation, i + 1, total);
      reports.push(report);

      if (report.error && isErrorKind(report.error, 'ConfigError')) {
        this.config.logger.error('Aborting run on configuration error', {
          operation: operation.name,
        });
        throw report.error;
      }
    }

    this.options.reporter?.onRunEnd?.(reports);
    return reports;
  }

  /**
   * Runs a single operation's test and reports it
   */
  async runTest(operation: ConformanceOperation, index: number, total: number): Promise<TestReport> {
    this.options.reporter?.onTestStart?.(formatTestLabel(index, total, operation.name));

    let report: TestReport;
    try {
      await this.execute(operation);
      report = this.finish({ operation: operation.name, index, total, phase: 'pass', passed: true });
    } catch (error) {
      if (!(error instanceof PhaseFailure)) {
        throw error;
      }
      report = this.finish({
        operation: operation.name,
        index,
        total,
        phase: error.phase,
        passed: false,
        error: error.error,
        ...(error.variant !== undefined && { variant: error.variant }),
      });
    }

    this.options.reporter?.onTestEnd(report);
    return report;
  }

  private finish(report: Omit<TestReport, 'message'>): TestReport {
    const message = formatReport(report);
    if (report.passed) {
      this.config.logger.info(message);
    } else {
      this.config.logger.error(message, {
        phase: report.phase,
        ...(report.variant !== undefined && { variant: report.variant }),
        ...(report.error && { error: report.error.toJSON() }),
      });
    }
    return { ...report, message };
  }

  private async execute(operation: ConformanceOperation): Promise<void> {
    this.enter(operation, 'init');
    this.enter(operation, 'build-expected');
    const variants = await this.phase('build-expected', undefined, () =>
      operation.variants(this.fixtures)
    );

    for (const variant of variants) {
      await this.runVariant(operation, variant);
    }
  }

  private async runVariant(operation: ConformanceOperation, variant: OperationVariant): Promise<void> {
    const label = variant.description;

    this.enter(operation, 'build-request', label);
    const signed = await this.phase('build-request', label, () =>
      buildSignedRequest(this.config, variant.request, this.clock())
    );

    this.enter(operation, 'execute', label);
    const response = await this.phase(
      'execute',
      label,
      () => this.config.transport.send(toHttpRequest(signed)),
      wrapError
    );

    this.enter(operation, 'verify', label);
    await this.phase('verify', label, () =>
      verifyResponse(response, variant.expectedStatus, variant.verifyBody)
    );
  }

  private enter(operation: ConformanceOperation, phase: TestPhase, variant?: string): void {
    this.config.logger.debug(`${operation.name}: ${phase}`, {
      ...(variant !== undefined && { variant }),
    });
  }

  /**
   * Runs one phase, turning a ConformanceError into a PhaseFailure.
   * Other errors are left alone unless `classify` maps them.
   */
  private async phase<T>(
    phase: TestPhase,
    variant: string | undefined,
    fn: () => T | Promise<T>,
    classify?: (error: unknown) => ConformanceError
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isConformanceError(error)) {
        throw new PhaseFailure(phase, error, variant);
      }
      if (classify) {
        throw new PhaseFailure(phase, classify(error), variant);
      }
      throw error;
    }
  }
}

/**
 * Runs the conformance tests and closes the config's transport afterwards
 */
export async function runConformance(
  config: ServerConfig,
  fixtures: FixtureContext,
  options: RunnerOptions = {}
): Promise<TestReport[]> {
  try {
    return await new ConformanceRunner(config, fixtures, options).run();
  } finally {
    await config.transport.close();
  }
}
