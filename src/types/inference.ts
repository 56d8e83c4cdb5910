export const DEFAULT_MODELS = {
  textGeneration: 'gpt2',
  speechRecognition: 'openai/whisper-large-v2',
  imageCaptioning: 'Salesforce/blip-image-captioning-large',
  visualQuestionAnswering: 'dandelin/vilt-b32-finetuned-vqa'
} as const;

export const DEFAULT_MAX_NEW_TOKENS = 200;

export interface TextGenerationRequest {
  prompt: string;
  model: string;
  maxNewTokens: number;
}

export interface SpeechRecognitionRequest {
  audio: Buffer;
  model: string;
}

export interface ImageToTextRequest {
  image: Buffer;
  model: string;
}

export interface VisualQuestionRequest {
  image: Buffer;
  question: string;
  model: string;
}

/**
 * Remote inference calls. Results are returned exactly as the provider shaped
 * them and decoded by the caller.
 */
export interface InferenceProvider {
  textGeneration(request: TextGenerationRequest): Promise<unknown>;
  automaticSpeechRecognition(request: SpeechRecognitionRequest): Promise<unknown>;
  imageToText(request: ImageToTextRequest): Promise<unknown>;
  visualQuestionAnswering(request: VisualQuestionRequest): Promise<unknown>;
}

export type AnyToAnyPayload =
  | { kind: 'bytes'; data: Buffer }
  | { kind: 'text'; text: string }
  | { kind: 'image-question'; image: Buffer; question?: string };

export interface AnyToAnyRequest {
  inputType: string;
  outputType: string;
  payload: AnyToAnyPayload;
  model?: string;
  /** Used for image->vqa when the payload carries no question of its own */
  question?: string;
}
