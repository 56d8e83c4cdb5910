import { HfInference } from '@huggingface/inference';
import type {
  ImageToTextRequest,
  InferenceProvider,
  SpeechRecognitionRequest,
  TextGenerationRequest,
  VisualQuestionRequest
} from '../types/inference';

const toBlob = (bytes: Buffer): Blob => new Blob([bytes]);

export class HfInferenceProvider implements InferenceProvider {
  private client: HfInference;

  constructor(token: string, fetchImpl?: typeof fetch) {
    if (!token) {
      throw new Error('HF_TOKEN is required');
    }
    this.client = new HfInference(token, fetchImpl ? { fetch: fetchImpl } : {});
  }

  public async textGeneration({ prompt, model, maxNewTokens }: TextGenerationRequest): Promise<unknown> {
    const output = await this.client.textGeneration({
      model,
      inputs: prompt,
      parameters: { max_new_tokens: maxNewTokens }
    });
    // The API answers with a list of generations; the SDK unwraps the first
    return [output];
  }

  public async automaticSpeechRecognition({ audio, model }: SpeechRecognitionRequest): Promise<unknown> {
    return this.client.automaticSpeechRecognition({ model, data: toBlob(audio) });
  }

  public async imageToText({ image, model }: ImageToTextRequest): Promise<unknown> {
    return this.client.imageToText({ model, data: toBlob(image) });
  }

  public async visualQuestionAnswering({ image, question, model }: VisualQuestionRequest): Promise<unknown> {
    return this.client.visualQuestionAnswering({
      model,
      inputs: { image: toBlob(image), question }
    });
  }
}
