import { Generated } from '../core/entities/GenerationResult';
import { WordAnalysisSpec } from '../core/entities/RequestSpec';
import { CefrLevel } from '../core/entities/Vocabulary';
import { WordAnalysis } from '../core/entities/WordAnalysis';
import { FallbackSynthesizer } from '../core/services/FallbackSynthesizer';
import { Logger } from '../core/services/Logger';
import { SchemaNormalizer } from '../core/services/SchemaNormalizer';
import { GenerationOptions, GenerationPipeline, OperationHandler } from './GenerationPipeline';
import { buildWordAnalysisSpec } from './requestSpecs';
import { AnalyzeWordRequest, analyzeWordRequestSchema, parseRequest } from './requests';

export class AnalyzeWordUseCase {
  private handler: OperationHandler<WordAnalysisSpec, WordAnalysis>;

  constructor(
    private pipeline: GenerationPipeline,
    private normalizer: SchemaNormalizer,
    private synthesizer: FallbackSynthesizer,
    private logger: Logger,
    private defaultUserLevel: CefrLevel = 'A2'
  ) {
    this.handler = {
      // any object may hold part of an analysis; the normalizer fills the rest
      accepts: () => true,
      normalize: (candidate, spec) => this.normalizer.normalizeWordAnalysis(candidate, spec),
      synthesize: (spec) => this.synthesizer.synthesizeWordAnalysis(spec),
    };
  }

  async execute(request: AnalyzeWordRequest, options?: GenerationOptions): Promise<Generated<WordAnalysis>> {
    const input = parseRequest(analyzeWordRequestSchema, request, 'analyzeWord');
    const spec = buildWordAnalysisSpec({
      word: input.word,
      context: input.context,
      outputLanguage: input.outputLanguage,
      userLevel: input.userLevel ?? this.defaultUserLevel,
      levelProvided: input.userLevel !== undefined,
    });

    this.logger.info(`Analyzing word "${spec.input.word}"`);
    return this.pipeline.run(spec, this.handler, options);
  }
}
