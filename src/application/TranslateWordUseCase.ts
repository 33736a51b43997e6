import { Generated } from '../core/entities/GenerationResult';
import { TranslationSpec } from '../core/entities/RequestSpec';
import { CefrLevel } from '../core/entities/Vocabulary';
import { WordTranslation } from '../core/entities/WordAnalysis';
import { FallbackSynthesizer } from '../core/services/FallbackSynthesizer';
import { Logger } from '../core/services/Logger';
import { SchemaNormalizer } from '../core/services/SchemaNormalizer';
import { GenerationOptions, GenerationPipeline, OperationHandler } from './GenerationPipeline';
import { buildTranslationSpec } from './requestSpecs';
import { TranslateRequest, parseRequest, translateRequestSchema } from './requests';

export class TranslateWordUseCase {
  private handler: OperationHandler<TranslationSpec, WordTranslation>;

  constructor(
    private pipeline: GenerationPipeline,
    private normalizer: SchemaNormalizer,
    private synthesizer: FallbackSynthesizer,
    private logger: Logger,
    private defaultUserLevel: CefrLevel = 'A2'
  ) {
    this.handler = {
      accepts: () => true,
      normalize: (candidate, spec) => this.normalizer.normalizeTranslation(candidate, spec),
      synthesize: (spec) => this.synthesizer.synthesizeTranslation(spec),
    };
  }

  async execute(request: TranslateRequest, options?: GenerationOptions): Promise<Generated<WordTranslation>> {
    const input = parseRequest(translateRequestSchema, request, 'translateAndAnalyze');
    const spec = buildTranslationSpec({
      ...input,
      userLevel: input.userLevel ?? this.defaultUserLevel,
    });

    this.logger.info(`Translating "${spec.input.word}" (${spec.input.sourceLanguage} -> ${spec.input.targetLanguage})`);
    return this.pipeline.run(spec, this.handler, options);
  }
}
