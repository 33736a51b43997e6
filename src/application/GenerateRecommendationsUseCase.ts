import { Generated } from '../core/entities/GenerationResult';
import { RecommendationSet } from '../core/entities/Recommendation';
import { RecommendationSpec } from '../core/entities/RequestSpec';
import { readObjectArray } from '../core/services/CandidateReader';
import { FallbackSynthesizer } from '../core/services/FallbackSynthesizer';
import { Logger } from '../core/services/Logger';
import { SchemaNormalizer } from '../core/services/SchemaNormalizer';
import { GenerationOptions, GenerationPipeline, OperationHandler } from './GenerationPipeline';
import { buildRecommendationSpec } from './requestSpecs';
import { UserProgressRequest, parseRequest, userProgressSchema } from './requests';

export class GenerateRecommendationsUseCase {
  private handler: OperationHandler<RecommendationSpec, RecommendationSet>;

  constructor(
    private pipeline: GenerationPipeline,
    private normalizer: SchemaNormalizer,
    private synthesizer: FallbackSynthesizer,
    private logger: Logger
  ) {
    this.handler = {
      // an empty list is no advice at all; the rule-based set replaces it
      accepts: (candidate) => (readObjectArray(candidate, 'recommendations') ?? []).length > 0,
      normalize: (candidate, spec) => this.normalizer.normalizeRecommendations(candidate, spec),
      synthesize: (spec) => this.synthesizer.synthesizeRecommendations(spec),
    };
  }

  async execute(request: UserProgressRequest, options?: GenerationOptions): Promise<Generated<RecommendationSet>> {
    const progress = parseRequest(userProgressSchema, request, 'generateRecommendations');
    const spec = buildRecommendationSpec({ progress });

    this.logger.info(`Generating recommendations for ${progress.masteredWords}/${progress.totalWords} mastered words`);
    return this.pipeline.run(spec, this.handler, options);
  }
}
