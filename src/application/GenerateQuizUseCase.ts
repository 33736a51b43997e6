import { Generated } from '../core/entities/GenerationResult';
import { Quiz } from '../core/entities/Quiz';
import { QuizBatchSpec } from '../core/entities/RequestSpec';
import { CefrLevel } from '../core/entities/Vocabulary';
import { BatchRebuilder, QUIZ_REBUILD_PLAN } from '../core/services/BatchRebuilder';
import { readObjectArray } from '../core/services/CandidateReader';
import { FallbackSynthesizer } from '../core/services/FallbackSynthesizer';
import { Logger } from '../core/services/Logger';
import { SchemaNormalizer } from '../core/services/SchemaNormalizer';
import { GenerationOptions, GenerationPipeline, OperationHandler, reportShortfall } from './GenerationPipeline';
import { buildQuizBatchSpec } from './requestSpecs';
import { QuizRequest, parseRequest, quizRequestSchema } from './requests';

export class GenerateQuizUseCase {
  private handler: OperationHandler<QuizBatchSpec, Quiz>;

  constructor(
    private pipeline: GenerationPipeline,
    private normalizer: SchemaNormalizer,
    private synthesizer: FallbackSynthesizer,
    private logger: Logger,
    private defaultUserLevel: CefrLevel = 'A2'
  ) {
    this.handler = {
      accepts: (candidate) => (readObjectArray(candidate, 'questions') ?? []).length > 0,
      normalize: (candidate, spec) => this.normalizer.normalizeQuiz(candidate, spec),
      synthesize: (spec) => this.synthesizer.synthesizeQuiz(spec),
      rebuilder: new BatchRebuilder(QUIZ_REBUILD_PLAN),
    };
  }

  async execute(request: QuizRequest, options?: GenerationOptions): Promise<Generated<Quiz>> {
    const input = parseRequest(quizRequestSchema, request, 'generateQuiz');
    const spec = buildQuizBatchSpec({ ...input, targetLevel: input.targetLevel ?? this.defaultUserLevel });

    this.logger.info(`Generating ${input.questionCount} ${input.testType} question(s) from ${input.words.length} word(s)`);
    const result = await this.pipeline.run(spec, this.handler, options);
    return reportShortfall(result, result.questions.length, input.questionCount, 'questions', this.logger);
  }
}
