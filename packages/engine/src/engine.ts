/**
 * Processing Engine
 * =================
 * Holds the current dataset and applies named operations to it through the
 * registry. `apply` is all-or-nothing: on any failure the current dataset is
 * left exactly as it was and the error reaches the caller unchanged.
 */

import {
  Dataset,
  InvalidDatasetError,
  InvalidOperationResultError,
  NoDataError,
  createSystemClock,
  type ClockPort,
  type OperationDescriptor,
} from '@tabflow/core';
import { createLogger, type Logger } from '@tabflow/utils';
import { createDefaultRegistry } from './defaults.js';
import type { OperationRegistry } from './registry.js';

export interface ProcessingEngineOptions {
  /** Source of the provenance `appliedAt` stamp */
  clock?: ClockPort;
  logger?: Logger;
}

export interface PipelineStep {
  operation: string;
  params?: Readonly<Record<string, unknown>>;
}

function describeReceived(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') return `an instance of ${value.constructor?.name ?? 'Object'}`;
  return typeof value;
}

export class ProcessingEngine {
  private current: Dataset | null = null;
  private readonly clock: ClockPort;
  private readonly log: Logger;

  constructor(
    private readonly registry: OperationRegistry = createDefaultRegistry(),
    options: ProcessingEngineOptions = {}
  ) {
    this.clock = options.clock ?? createSystemClock();
    this.log = options.logger ?? createLogger('engine');
  }

  /**
   * Replace the current dataset
   */
  setData(dataset: Dataset): this {
    if (!(dataset instanceof Dataset)) {
      throw new InvalidDatasetError('setData expects a Dataset', { received: describeReceived(dataset) });
    }
    this.current = dataset;
    this.log.debug('Dataset set', {
      source: dataset.provenance.source ?? undefined,
      rows: dataset.rowCount,
      columns: dataset.columns.length,
    });
    return this;
  }

  /**
   * @throws NoDataError before the first setData
   */
  getData(): Dataset {
    if (this.current === null) {
      throw new NoDataError();
    }
    return this.current;
  }

  hasData(): boolean {
    return this.current !== null;
  }

  /**
   * Resolve, validate and run one operation against the current dataset
   */
  apply(name: string, params: Readonly<Record<string, unknown>> = {}): this {
    const input = this.getData();
    try {
      const bound = this.registry.resolve(name).bind(params);
      const result = bound.apply(input);
      if (!(result instanceof Dataset)) {
        throw new InvalidOperationResultError(name, describeReceived(result));
      }

      const appliedAt = this.clock.now().toISO() ?? null;
      this.current = result.withProvenance({ lastOperation: name, appliedAt });
      this.log.info('Applied operation', {
        operation: name,
        rowsIn: input.rowCount,
        rowsOut: result.rowCount,
      });
      return this;
    } catch (error) {
      this.log.warn('Operation failed', {
        operation: name,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Apply steps in order. If any step fails, the dataset from before the first
   * step is restored and the step's error is rethrown.
   */
  pipeline(steps: readonly PipelineStep[]): this {
    const snapshot = this.getData();
    let index = 0;
    try {
      for (const step of steps) {
        this.apply(step.operation, step.params ?? {});
        index += 1;
      }
    } catch (error) {
      this.current = snapshot;
      this.log.warn('Pipeline rolled back', { step: index, steps: steps.length });
      throw error;
    }
    this.log.info('Pipeline completed', {
      steps: steps.length,
      rowsIn: snapshot.rowCount,
      rowsOut: this.getData().rowCount,
    });
    return this;
  }

  listOperations(): OperationDescriptor[] {
    return this.registry.describeAll();
  }
}
