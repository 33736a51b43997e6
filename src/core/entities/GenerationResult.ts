export type ResultSource = 'provider' | 'fallback';

export interface GenerationOutcome {
  // "fallback" when the result was synthesized without model output
  source: ResultSource;
  // why the result is degraded (fallback reason or an under-filled batch), null otherwise
  error: string | null;
}

export type Generated<T extends object> = T & GenerationOutcome;
