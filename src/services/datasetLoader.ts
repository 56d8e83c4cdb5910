import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type {
  DatasetFeatures,
  DatasetLoader,
  LoadArgs,
  LoadedDataset
} from '../types/dataset';

const SplitInfoSchema = z
  .object({
    name: z.string().optional(),
    num_examples: z.number().int().nonnegative().optional()
  })
  .passthrough();

const ConfigInfoSchema = z
  .object({
    config_name: z.string().optional(),
    features: z.record(z.unknown()).optional(),
    splits: z.record(SplitInfoSchema)
  })
  .passthrough();

const InfoResponseSchema = z.object({
  dataset_info: z.record(z.unknown())
});

type ConfigInfo = z.infer<typeof ConfigInfoSchema>;

export class HubDataset implements LoadedDataset {
  public readonly type = 'DatasetDict';

  constructor(
    private readonly rowsPerSplit: Record<string, number | undefined>,
    private readonly featureSchema: DatasetFeatures | null
  ) {}

  public splitNames(): string[] {
    return Object.keys(this.rowsPerSplit);
  }

  public numRows(split?: string): number {
    const rows = split === undefined ? undefined : this.rowsPerSplit[split];
    if (rows === undefined) {
      throw new Error(`Row count unknown for split '${split ?? ''}'`);
    }
    return rows;
  }

  public features(): DatasetFeatures | null {
    return this.featureSchema;
  }
}

/**
 * Loads dataset metadata from the Hugging Face dataset viewer API. Only the
 * split layout and feature schema are fetched; rows stay on the hub.
 */
export class HubDatasetLoader implements DatasetLoader {
  private client: AxiosInstance;

  constructor(baseURL: string, token?: string, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL,
      headers: token ? { 'Authorization': `Bearer ${token}` } : {}
    });
  }

  public async load(name: string, ...args: LoadArgs): Promise<LoadedDataset> {
    const [subset] = args;

    const params: Record<string, string> = { dataset: name };
    if (subset !== undefined) {
      params.config = subset;
    }

    const response = await this.client.get('/info', { params });
    const body = InfoResponseSchema.parse(response.data);
    const config = this.selectConfig(name, body.dataset_info, subset);

    const rowsPerSplit: Record<string, number | undefined> = {};
    for (const [splitName, split] of Object.entries(config.splits)) {
      rowsPerSplit[splitName] = split.num_examples;
    }

    return new HubDataset(rowsPerSplit, config.features ?? null);
  }

  // With a config the API answers with that config's info; without one it
  // answers with every config keyed by name.
  private selectConfig(name: string, info: Record<string, unknown>, subset?: string): ConfigInfo {
    if ('splits' in info) {
      return ConfigInfoSchema.parse(info);
    }

    const configNames = Object.keys(info);
    const chosen = subset ??
      (configNames.length === 1 ? configNames[0] : configNames.find((c) => c === 'default'));

    if (chosen === undefined) {
      throw new Error(
        `Config name is missing for dataset ${name}. Please pick one among the available configs: [${configNames.map((c) => `'${c}'`).join(', ')}]`
      );
    }

    const entry = info[chosen];
    if (entry === undefined) {
      throw new Error(`BuilderConfig '${chosen}' not found for dataset ${name}. Available: [${configNames.join(', ')}]`);
    }
    return ConfigInfoSchema.parse(entry);
  }
}
