import type {
  DatasetFeatures,
  DatasetLoader,
  DatasetType,
  LoadArgs,
  LoadedDataset
} from '../types/dataset';
import type {
  ImageToTextRequest,
  InferenceProvider,
  SpeechRecognitionRequest,
  TextGenerationRequest,
  VisualQuestionRequest
} from '../types/inference';

export class FakeDataset implements LoadedDataset {
  constructor(
    public readonly type: DatasetType,
    private readonly rows: Record<string, number> | number,
    private readonly schema: DatasetFeatures | null = null,
    private readonly failOnFeatures = false
  ) {}

  public splitNames(): string[] | null {
    return typeof this.rows === 'number' ? null : Object.keys(this.rows);
  }

  public numRows(split?: string): number {
    if (typeof this.rows === 'number') return this.rows;
    const rows = split === undefined ? undefined : this.rows[split];
    if (rows === undefined) throw new Error(`no split ${split ?? ''}`);
    return rows;
  }

  public features(): DatasetFeatures | null {
    if (this.failOnFeatures) throw new Error('features unavailable');
    return this.schema;
  }
}

export interface LoadCall {
  name: string;
  subset?: string;
  arity: number;
}

export class FakeDatasetLoader implements DatasetLoader {
  public calls: LoadCall[] = [];
  private result: () => Promise<LoadedDataset>;

  constructor(result?: () => Promise<LoadedDataset>) {
    this.result = result ?? (async () => new FakeDataset('DatasetDict', { train: 3, test: 1 }, { question: 'string' }));
  }

  public async load(name: string, ...args: LoadArgs): Promise<LoadedDataset> {
    if (args.length === 1) {
      this.calls.push({ name, subset: args[0], arity: 2 });
    } else {
      this.calls.push({ name, arity: 1 });
    }
    return this.result();
  }
}

/** Records every request and answers with whatever the test queued. */
export class FakeInferenceProvider implements InferenceProvider {
  public textRequests: TextGenerationRequest[] = [];
  public speechRequests: SpeechRecognitionRequest[] = [];
  public imageRequests: ImageToTextRequest[] = [];
  public vqaRequests: VisualQuestionRequest[] = [];

  public textResult: unknown = [{ generated_text: 'generated' }];
  public speechResult: unknown = { text: 'transcript' };
  public imageResult: unknown = { generated_text: 'a cat' };
  public vqaResult: unknown = { answer: 'two', score: 0.9 };
  public failure: Error | null = null;

  public async textGeneration(request: TextGenerationRequest): Promise<unknown> {
    this.textRequests.push(request);
    return this.answer(this.textResult);
  }

  public async automaticSpeechRecognition(request: SpeechRecognitionRequest): Promise<unknown> {
    this.speechRequests.push(request);
    return this.answer(this.speechResult);
  }

  public async imageToText(request: ImageToTextRequest): Promise<unknown> {
    this.imageRequests.push(request);
    return this.answer(this.imageResult);
  }

  public async visualQuestionAnswering(request: VisualQuestionRequest): Promise<unknown> {
    this.vqaRequests.push(request);
    return this.answer(this.vqaResult);
  }

  private answer(result: unknown): unknown {
    if (this.failure) throw this.failure;
    return result;
  }
}
