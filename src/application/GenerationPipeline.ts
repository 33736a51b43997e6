import { GenerationOutcome, Generated } from '../core/entities/GenerationResult';
import { RequestSpec } from '../core/entities/RequestSpec';
import { ExtractionError, MalformedBatchError, ProviderError, errorMessage } from '../core/errors';
import { RecordRebuilder } from '../core/services/BatchRebuilder';
import { CandidateObject } from '../core/services/CandidateReader';
import { repairJson } from '../core/services/JsonRepair';
import { Logger } from '../core/services/Logger';
import { ProviderAdapter } from '../core/services/ProviderAdapter';
import { ResponseExtractor, stripNonContent } from '../core/services/ResponseExtractor';

export type PipelineStage =
  | 'BUILD_PROMPT'
  | 'CALL_PROVIDER'
  | 'EXTRACT'
  | 'REPAIR'
  | 'NORMALIZE'
  | 'DONE'
  | 'ERROR'
  | 'FALLBACK';

// What the pipeline needs to know about one operation
export interface OperationHandler<S extends RequestSpec, R extends object> {
  // whether a parsed candidate carries this operation's content
  accepts(candidate: CandidateObject): boolean;
  normalize(candidate: CandidateObject, spec: S): R;
  synthesize(spec: S): R;
  // batch shapes only
  rebuilder?: RecordRebuilder;
}

export interface GenerationOptions {
  signal?: AbortSignal;
  // overrides the pipeline's provider timeout for this call
  timeoutMs?: number;
}

export const DEFAULT_PROVIDER_TIMEOUT_MS = 15000;

/**
 * Runs one generation call: prompt -> provider -> extract -> repair ->
 * normalize. Any provider or parsing failure ends in a synthesized result,
 * so `run` only rejects on bugs in the handler's synthesizer.
 */
export class GenerationPipeline {
  constructor(
    private provider: ProviderAdapter,
    private extractor: ResponseExtractor,
    private logger: Logger,
    private timeoutMs: number = DEFAULT_PROVIDER_TIMEOUT_MS
  ) {}

  async run<S extends RequestSpec, R extends object>(
    spec: S,
    handler: OperationHandler<S, R>,
    options: GenerationOptions = {}
  ): Promise<Generated<R>> {
    this.enter(spec, 'BUILD_PROMPT');

    let raw: string;
    try {
      this.enter(spec, 'CALL_PROVIDER');
      raw = await this.callProvider(spec, options);
    } catch (error) {
      return this.fallback(spec, handler, error);
    }

    try {
      const candidate = this.parse(spec, handler, raw);
      if (!candidate) throw new ExtractionError('Model response could not be turned into a usable result');

      this.enter(spec, 'NORMALIZE');
      const result = handler.normalize(candidate, spec);
      this.enter(spec, 'DONE');
      const outcome: GenerationOutcome = { source: 'provider', error: null };
      return { ...result, ...outcome };
    } catch (error) {
      return this.fallback(spec, handler, error);
    }
  }

  private enter(spec: RequestSpec, stage: PipelineStage): void {
    this.logger.debug(`[${spec.kind}] ${stage}`);
  }

  private async callProvider(spec: RequestSpec, options: GenerationOptions): Promise<string> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new ProviderError('cancelled', 'Request was cancelled before the provider call');
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(new ProviderError('cancelled', 'Request was cancelled'));
    signal?.addEventListener('abort', onCallerAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new ProviderError('timeout', `Provider did not respond within ${timeoutMs}ms`)),
      timeoutMs
    );
    // settles first when the call is abandoned, whatever the adapter does with the signal
    const interrupted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      return await Promise.race([
        this.provider.complete(spec.prompt, spec.systemPrompt, { signal: controller.signal }),
        interrupted,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private parse<S extends RequestSpec, R extends object>(
    spec: S,
    handler: OperationHandler<S, R>,
    raw: string
  ): CandidateObject | undefined {
    this.enter(spec, 'EXTRACT');
    const accepts = (candidate: CandidateObject): boolean => handler.accepts(candidate);
    let candidate = this.tryExtract(raw, accepts);

    if (!candidate) {
      this.enter(spec, 'REPAIR');
      candidate = this.tryExtract(repairJson(stripNonContent(raw)), accepts);
    }
    if (candidate && handler.accepts(candidate)) return candidate;

    if (handler.rebuilder) {
      this.enter(spec, 'REPAIR');
      const expected = spec.bounds.itemCount ?? Number.MAX_SAFE_INTEGER;
      const rebuilt = handler.rebuilder.rebuild(stripNonContent(raw), expected);
      if (handler.accepts(rebuilt)) {
        this.logger.info(`[${spec.kind}] Rebuilt batch records from malformed model output`);
        return rebuilt;
      }
    }
    return undefined;
  }

  private tryExtract(text: string, accepts: (candidate: CandidateObject) => boolean): CandidateObject | undefined {
    try {
      return this.extractor.extract(text, accepts);
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error;
      this.logger.debug(`Extraction failed: ${error.message}`);
      return undefined;
    }
  }

  private fallback<S extends RequestSpec, R extends object>(
    spec: S,
    handler: OperationHandler<S, R>,
    error: unknown
  ): Generated<R> {
    this.enter(spec, 'ERROR');
    const reason = error instanceof ProviderError ? `${error.kind}: ${error.message}` : errorMessage(error);
    this.logger.warn(`[${spec.kind}] Falling back to synthesized result (${reason})`);

    this.enter(spec, 'FALLBACK');
    const result = handler.synthesize(spec);
    this.enter(spec, 'DONE');
    const outcome: GenerationOutcome = { source: 'fallback', error: reason };
    return { ...result, ...outcome };
  }
}

/**
 * Marks a provider batch that came back with fewer records than requested.
 * The batch is returned as is; it is never padded with invented records.
 */
export function reportShortfall<R extends object>(
  result: Generated<R>,
  recovered: number,
  requested: number,
  what: string,
  logger: Logger
): Generated<R> {
  if (result.source !== 'provider' || recovered >= requested) return result;
  const shortfall = new MalformedBatchError(requested, recovered, what);
  logger.warn(shortfall.message);
  return { ...result, error: shortfall.message };
}
