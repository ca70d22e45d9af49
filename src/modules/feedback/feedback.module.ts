import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChildProcessRunner } from '../../common/process/child-process.runner';
import { PROCESS_RUNNER_TOKEN } from '../../common/process/process-runner.interface';
import type { ProviderSettings } from '../../config/configuration';
import { ANNOTATION_PROVIDER_TOKEN } from './annotation/interfaces/annotation-provider.interface';
import { OpenRouterAnnotationProvider } from './annotation/providers/openrouter-annotation.provider';
import { AnnotationGuardsService } from './annotation/services/annotation-guards.service';
import { DraftStageService } from './annotation/services/draft-stage.service';
import { LinterDigestService } from './annotation/services/linter-digest.service';
import { ReviewStageService } from './annotation/services/review-stage.service';
import { StubAnnotationProvider } from './annotation/services/stub-annotation.provider';
import { ArtifactStoreService } from './artifacts/services/artifact-store.service';
import { DiffAnalyzerService } from './diff/services/diff-analyzer.service';
import { FeedbackOutputService } from './merge/services/feedback-output.service';
import { ProvenanceAnnotatorService } from './provenance/services/provenance-annotator.service';
import { FeedbackRunService } from './services/feedback-run.service';

@Module({
  providers: [
    ArtifactStoreService,
    DiffAnalyzerService,
    ProvenanceAnnotatorService,
    DraftStageService,
    ReviewStageService,
    LinterDigestService,
    AnnotationGuardsService,
    FeedbackOutputService,
    FeedbackRunService,
    StubAnnotationProvider,
    OpenRouterAnnotationProvider,
    {
      provide: PROCESS_RUNNER_TOKEN,
      useClass: ChildProcessRunner,
    },
    {
      provide: ANNOTATION_PROVIDER_TOKEN,
      inject: [
        ConfigService,
        StubAnnotationProvider,
        OpenRouterAnnotationProvider,
      ],
      useFactory: (
        configService: ConfigService,
        stubProvider: StubAnnotationProvider,
        openRouterProvider: OpenRouterAnnotationProvider,
      ) => {
        const { name } = configService.getOrThrow<ProviderSettings>('provider');
        return name === 'stub' ? stubProvider : openRouterProvider;
      },
    },
  ],
  exports: [FeedbackRunService, ArtifactStoreService],
})
export class FeedbackModule {}
