import { DeepgramConverter, srt } from '@deepgram/captions';
import { DEFAULT_LINE_LENGTH } from './config';

/**
 * Boundary to the captioning library. `adapt` wraps a parsed transcription
 * response into the library's model, `render` turns that model into SRT text.
 * Both may throw; the runner reports such throws as conversion failures.
 */
export interface CaptionBackend<TModel = unknown> {
  readonly name: string;
  adapt(document: unknown): TModel;
  render(model: TModel): string;
}

type DeepgramDocument = ConstructorParameters<typeof DeepgramConverter>[0];

// Checks the top-level key only; the library owns the rest of the response
// shape and throws from `srt` when it is missing.
function isDeepgramDocument(value: unknown): value is DeepgramDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'results' in value;
}

export function createDeepgramSrtBackend(options?: { lineLength?: number }): CaptionBackend<DeepgramConverter> {
  const lineLength = options?.lineLength ?? DEFAULT_LINE_LENGTH;
  return {
    name: 'deepgram-srt',
    adapt(document) {
      if (!isDeepgramDocument(document)) {
        throw new Error('Document is not a Deepgram transcription response (missing "results")');
      }
      return new DeepgramConverter(document);
    },
    render(model) {
      return srt(model, lineLength);
    },
  };
}
