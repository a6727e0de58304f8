import 'reflect-metadata';

export { AppModule } from './app.module';
export { validateEnv } from './config/env.config';
export type { EnvConfig } from './config/env.config';
export { GridModule } from './modules/grid/grid.module';
export { GridNormalizerService } from './modules/grid/grid-normalizer.service';
export { DetectionModule } from './modules/detection/detection.module';
export { RegionDetectorService } from './modules/detection/region-detector.service';
export { RegionValidatorService } from './modules/detection/region-validator.service';
export * from './modules/detection/strategies';
export { HeadersModule } from './modules/headers/headers.module';
export { HeaderResolverService } from './modules/headers/header-resolver.service';
export { LabelBuilderService } from './modules/headers/label-builder.service';
export { TablesModule } from './modules/tables/tables.module';
export { TableAssemblerService } from './modules/tables/table-assembler.service';
export { CompactTableAssemblerService } from './modules/tables/compact-table-assembler.service';
export { TitleDetectorService, isPlausibleTitle } from './modules/tables/title-detector.service';
export type { TitleDetection } from './modules/tables/title-detector.service';
export { TableExtractionService } from './modules/tables/table-extraction.service';
