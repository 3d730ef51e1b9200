import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PreprocessConfigService } from '../config/preprocess-config.service';
import { FunctionalGrouperService } from './grouper';
import { HeaderFooterRemoverService } from './noise/header-footer-remover.service';
import { TextNormalizerService } from './normalizer/text-normalizer.service';
import { PreprocessEngine } from './preprocess.engine';
import { PreprocessingTcpController } from './preprocessing-tcp.controller';
import { PreprocessingController } from './preprocessing.controller';
import {
  CompositeHeadingDetector,
  FontSizeHeadingDetector,
  HierarchyValidator,
  PatternHeadingDetector,
  SectionFlattener,
  SectionSegmenterService,
  TreeConstructor,
} from './segmenter';

@Module({
  imports: [ConfigModule],
  controllers: [PreprocessingController, PreprocessingTcpController],
  providers: [
    PreprocessConfigService,
    // Stage services
    TextNormalizerService,
    HeaderFooterRemoverService,
    SectionSegmenterService,
    FunctionalGrouperService,
    // Segmentation helpers
    PatternHeadingDetector,
    FontSizeHeadingDetector,
    CompositeHeadingDetector,
    TreeConstructor,
    HierarchyValidator,
    SectionFlattener,
    PreprocessEngine,
  ],
  exports: [
    PreprocessEngine,
    TextNormalizerService,
    HeaderFooterRemoverService,
    SectionSegmenterService,
    FunctionalGrouperService,
  ],
})
export class PreprocessingModule {}
