/** `Dataset` is an unsplit handle; the hub loader always answers with splits */
export type DatasetType = 'DatasetDict' | 'Dataset';

export type DatasetFeatures = Record<string, unknown>;

/**
 * Handle to a loaded dataset. Accessors may throw when the underlying object
 * cannot answer, e.g. row counts of an unknown split.
 */
export interface LoadedDataset {
  readonly type: DatasetType;
  /** null when the dataset is not split */
  splitNames(): string[] | null;
  numRows(split?: string): number;
  features(): DatasetFeatures | null;
}

/** Passing a subset selects a different load call, not a different value */
export interface DatasetLoader {
  load(name: string): Promise<LoadedDataset>;
  load(name: string, subset: string): Promise<LoadedDataset>;
}

export type LoadArgs = [] | [subset: string];

export interface DatasetInfo {
  key: string;
  type: DatasetType;
  splits?: string[];
  size_per_split?: Record<string, number>;
  length?: number;
  features?: DatasetFeatures | null;
}

export type SupportedDatasetTable = Readonly<Record<string, ReadonlyArray<string | null>>>;
