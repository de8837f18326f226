/**
 * Base class for all analysis results
 */

import { ResultMetadata } from './ResultMetadata';

/**
 * Abstract base class that all analysis results extend
 * Provides common functionality for serialization and export
 */
export abstract class AnalysisResult {
  constructor(protected readonly metadata: ResultMetadata) {}

  getMetadata(): ResultMetadata {
    return this.metadata;
  }

  /**
   * Convert the result to a JSON-serializable object
   */
  abstract toJSON(): object;

  /**
   * Serialize the result as text in the given format
   */
  export(format: 'json' | 'csv'): string {
    return format === 'json' ? JSON.stringify(this.toJSON(), null, 2) : this.exportCSV();
  }

  /**
   * CSV representation; subclasses decide which table to emit
   */
  protected abstract exportCSV(): string;
}
