/**
 * Metadata structure for all analysis results
 */

/**
 * Metadata that accompanies every analysis result
 */
export interface ResultMetadata {
  /** When the result was computed */
  timestamp: Date;

  /** Variant labels the result compares, when it compares any */
  variants?: {
    baseline: string;
    candidate: string;
  };

  /** Group key the result belongs to, for per-group comparisons */
  group?: Readonly<Record<string, string>>;

  /** Number of input rows behind the result */
  sampleSize?: number;
}
