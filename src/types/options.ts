/**
 * Options governing schema inference
 */

export interface InferenceOptions {
  /** Examples kept per node */
  exampleCap: number;

  /** Collapse date-shaped sibling keys into placeholder properties */
  abstractDateKeys: boolean;

  /** Smallest group of same-pattern sibling keys that gets abstracted */
  minKeyGroupSize: number;

  /** Placeholder name template; `{pattern}` and `{depth}` are substituted */
  placeholderTemplate: string;

  /** Sample only the first N elements of each array; undefined samples all */
  maxArrayItems?: number;
}

export const DEFAULT_INFERENCE_OPTIONS: Readonly<InferenceOptions> = {
  exampleCap: 5,
  abstractDateKeys: true,
  minKeyGroupSize: 1,
  placeholderTemplate: "{pattern}_{depth}",
};
