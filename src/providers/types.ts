/**
 * Generation provider types
 */

export interface GenerationRequest {
  /** System instruction framing the answer */
  system: string;
  /** User turn: context block plus question */
  prompt: string;
  temperature: number;
}

/**
 * A chat model that answers one prompt. Only the `ask` operation uses it.
 */
export interface GenerationService {
  readonly model: string;
  generate(request: GenerationRequest, options?: { signal?: AbortSignal }): Promise<string>;
}
