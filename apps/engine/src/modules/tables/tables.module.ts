import { Module } from '@nestjs/common';
import { GridModule } from '../grid/grid.module';
import { DetectionModule } from '../detection/detection.module';
import { HeadersModule } from '../headers/headers.module';
import { TableAssemblerService } from './table-assembler.service';
import { CompactTableAssemblerService } from './compact-table-assembler.service';
import { TitleDetectorService } from './title-detector.service';
import { TableExtractionService } from './table-extraction.service';

@Module({
  imports: [GridModule, DetectionModule, HeadersModule],
  providers: [
    TableAssemblerService,
    CompactTableAssemblerService,
    TitleDetectorService,
    TableExtractionService,
  ],
  exports: [TableExtractionService],
})
export class TablesModule {}
