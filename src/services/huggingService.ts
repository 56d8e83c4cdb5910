import { UnsupportedConversionError, ValidationError } from '../errors';
import type {
  DatasetInfo,
  DatasetLoader,
  LoadedDataset,
  SupportedDatasetTable
} from '../types/dataset';
import type { AnyToAnyPayload, AnyToAnyRequest, InferenceProvider } from '../types/inference';
import { DEFAULT_MAX_NEW_TOKENS, DEFAULT_MODELS } from '../types/inference';
import { DatasetCache } from './datasetCache';
import { extractGeneratedText, extractTranscript, stringify } from './responseDecoder';

export const SUPPORTED_DATASETS: SupportedDatasetTable = {
  'openai/gsm8k': ['main', 'socratic'],
  'mrmrx/CADS-dataset': ['0001_visceral_gc', '0002_visceral_sc', '0003_kits21'],
  'openai/gdpval': [null],
  'kraina/airbnb': ['all', 'weekdays', 'weekends']
};

export interface HuggingServiceOptions {
  /** 0 keeps every loaded dataset */
  datasetCacheCapacity?: number;
}

/**
 * Facade over the inference provider and the dataset loader. One instance is
 * built at startup when a credential is present and shared by every route.
 */
export class HuggingService {
  public readonly supported: SupportedDatasetTable = SUPPORTED_DATASETS;
  private provider: InferenceProvider;
  private loader: DatasetLoader;
  private datasets: DatasetCache<LoadedDataset>;

  constructor(provider: InferenceProvider, loader: DatasetLoader, options: HuggingServiceOptions = {}) {
    this.provider = provider;
    this.loader = loader;
    this.datasets = new DatasetCache<LoadedDataset>({ capacity: options.datasetCacheCapacity });
  }

  public get cachedDatasetKeys(): string[] {
    return this.datasets.keys();
  }

  /** `streaming` is logged only; it never reaches the loader or the cache key */
  public async loadDataset(name: string, subset?: string | null, streaming: boolean = false): Promise<DatasetInfo> {
    const key = DatasetCache.key(name, subset);

    const { value: ds, cached } = await this.datasets.getOrLoad(key, () => {
      console.log(`Loading dataset ${name} subset=${subset || '-'} streaming=${streaming}`);
      return subset ? this.loader.load(name, subset) : this.loader.load(name);
    });

    if (cached) {
      console.log(`Dataset cached: ${key}`);
    }

    return this.summarize(key, ds);
  }

  public async generateText(
    prompt: string,
    model: string = DEFAULT_MODELS.textGeneration,
    maxNewTokens: number = DEFAULT_MAX_NEW_TOKENS
  ): Promise<string> {
    const result = await this.provider.textGeneration({
      prompt,
      model,
      maxNewTokens: Math.trunc(maxNewTokens)
    });
    return extractGeneratedText(result);
  }

  public async transcribeAudio(audio: Buffer, model: string = DEFAULT_MODELS.speechRecognition): Promise<string> {
    const result = await this.provider.automaticSpeechRecognition({ audio, model });
    return extractTranscript(result);
  }

  public async analyzeImage(image: Buffer, model: string = DEFAULT_MODELS.imageCaptioning): Promise<string> {
    const result = await this.provider.imageToText({ image, model });
    return stringify(result);
  }

  public async multimodalVQA(
    image: Buffer,
    question: string,
    model: string = DEFAULT_MODELS.visualQuestionAnswering
  ): Promise<string> {
    const result = await this.provider.visualQuestionAnswering({ image, question, model });
    return stringify(result);
  }

  public async anyToAny({ inputType, outputType, payload, model, question }: AnyToAnyRequest): Promise<string> {
    if (inputType === 'audio' && outputType === 'text') {
      return this.transcribeAudio(requireBytes(payload, 'audio->text'), model || DEFAULT_MODELS.speechRecognition);
    }

    if (inputType === 'image' && outputType === 'caption') {
      return this.analyzeImage(requireBytes(payload, 'image->caption'), model || DEFAULT_MODELS.imageCaptioning);
    }

    if (inputType === 'image' && outputType === 'vqa') {
      const asked = (payload.kind === 'image-question' ? payload.question : undefined) || question;
      if (!asked) {
        throw new ValidationError('Missing question for image->vqa');
      }
      const image = payload.kind === 'image-question' ? payload.image : requireBytes(payload, 'image->vqa');
      return this.multimodalVQA(image, asked, model || DEFAULT_MODELS.visualQuestionAnswering);
    }

    if (inputType === 'text' && outputType === 'text') {
      const prompt = payload.kind === 'text' ? payload.text : requireBytes(payload, 'text->text').toString('utf8');
      return this.generateText(prompt, model || DEFAULT_MODELS.textGeneration);
    }

    throw new UnsupportedConversionError(inputType, outputType);
  }

  private summarize(key: string, ds: LoadedDataset): DatasetInfo {
    const info: DatasetInfo = { key, type: ds.type };

    try {
      const splits = ds.splitNames();
      if (splits) {
        info.splits = splits;
        const sizes: Record<string, number> = {};
        for (const split of splits) {
          sizes[split] = ds.numRows(split);
        }
        info.size_per_split = sizes;
      } else {
        info.length = ds.numRows();
      }
      info.features = ds.features();
    } catch (error) {
      console.error(`Failed to summarize dataset ${key}:`, error);
    }

    return info;
  }
}

const requireBytes = (payload: AnyToAnyPayload, conversion: string): Buffer => {
  if (payload.kind === 'bytes') return payload.data;
  if (payload.kind === 'image-question') return payload.image;
  throw new ValidationError(`${conversion} requires an uploaded file`);
};
