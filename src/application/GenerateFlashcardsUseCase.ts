import { FlashcardSession } from '../core/entities/Flashcard';
import { Generated } from '../core/entities/GenerationResult';
import { FlashcardBatchSpec } from '../core/entities/RequestSpec';
import { CefrLevel } from '../core/entities/Vocabulary';
import { BatchRebuilder, FLASHCARD_REBUILD_PLAN } from '../core/services/BatchRebuilder';
import { readObjectArray } from '../core/services/CandidateReader';
import { FallbackSynthesizer } from '../core/services/FallbackSynthesizer';
import { Logger } from '../core/services/Logger';
import { SchemaNormalizer } from '../core/services/SchemaNormalizer';
import { GenerationOptions, GenerationPipeline, OperationHandler, reportShortfall } from './GenerationPipeline';
import { buildFlashcardBatchSpec } from './requestSpecs';
import { FlashcardRequest, flashcardRequestSchema, parseRequest } from './requests';

export class GenerateFlashcardsUseCase {
  private handler: OperationHandler<FlashcardBatchSpec, FlashcardSession>;

  constructor(
    private pipeline: GenerationPipeline,
    private normalizer: SchemaNormalizer,
    private synthesizer: FallbackSynthesizer,
    private logger: Logger,
    private defaultUserLevel: CefrLevel = 'A2'
  ) {
    this.handler = {
      accepts: (candidate) => (readObjectArray(candidate, ['cards', 'flashcards']) ?? []).length > 0,
      normalize: (candidate, spec) => this.normalizer.normalizeFlashcardBatch(candidate, spec),
      synthesize: (spec) => this.synthesizer.synthesizeFlashcardBatch(spec),
      rebuilder: new BatchRebuilder(FLASHCARD_REBUILD_PLAN),
    };
  }

  async execute(request: FlashcardRequest, options?: GenerationOptions): Promise<Generated<FlashcardSession>> {
    const input = parseRequest(flashcardRequestSchema, request, 'generateFlashcards');
    // one card per word, up to the session's card count
    const words = input.words.slice(0, input.sessionConfig.count);
    const sessionConfig = { ...input.sessionConfig, userLevel: input.sessionConfig.userLevel ?? this.defaultUserLevel };
    const spec = buildFlashcardBatchSpec({ words, sessionConfig });

    this.logger.info(`Generating ${words.length} flashcard(s) for a ${sessionConfig.userLevel} session`);
    const result = await this.pipeline.run(spec, this.handler, options);
    return reportShortfall(result, result.cards.length, words.length, 'cards', this.logger);
  }
}
