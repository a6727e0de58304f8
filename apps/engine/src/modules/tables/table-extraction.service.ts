import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  CompactTable,
  DetectionDefaults,
  DetectionOptions,
  Grid,
  SheetTables,
  TableOptionsInput,
  VerboseTable,
} from '@sheet-tables/shared';
import {
  assertGrid,
  resolveDetectionOptions,
  tableOptionsSchema,
  workbookSchema,
} from '@sheet-tables/shared';
import { GridNormalizerService } from '../grid/grid-normalizer.service';
import { RegionDetectorService } from '../detection/region-detector.service';
import { HeaderResolverService } from '../headers/header-resolver.service';
import { TableAssemblerService } from './table-assembler.service';
import { CompactTableAssemblerService } from './compact-table-assembler.service';
import { TitleDetectorService } from './title-detector.service';
import { detectionEnvSchema } from '../../config/env.config';

/**
 * Runs the full pipeline for a sheet or a workbook:
 * detect regions, resolve headers, then assemble tables in emission order.
 */
@Injectable()
export class TableExtractionService {
  private readonly logger = new Logger(TableExtractionService.name);
  private readonly verboseDefaults: DetectionDefaults;
  private readonly compactDefaults: DetectionDefaults;

  constructor(
    private readonly config: ConfigService,
    private readonly normalizer: GridNormalizerService,
    private readonly detector: RegionDetectorService,
    private readonly headerResolver: HeaderResolverService,
    private readonly assembler: TableAssemblerService,
    private readonly compactAssembler: CompactTableAssemblerService,
    private readonly titleDetector: TitleDetectorService,
  ) {
    const env = detectionEnvSchema.parse({
      TABLE_DETECTION_USE_GAPS: this.config.get<unknown>('TABLE_DETECTION_USE_GAPS'),
      TABLE_GAP_THRESHOLD: this.config.get<unknown>('TABLE_GAP_THRESHOLD'),
      COMPACT_GAP_THRESHOLD: this.config.get<unknown>('COMPACT_GAP_THRESHOLD'),
    });
    this.verboseDefaults = {
      useGaps: env.TABLE_DETECTION_USE_GAPS,
      gapThreshold: env.TABLE_GAP_THRESHOLD,
    };
    this.compactDefaults = {
      useGaps: env.TABLE_DETECTION_USE_GAPS,
      gapThreshold: env.COMPACT_GAP_THRESHOLD,
    };
  }

  extractTables(grid: Grid | null | undefined, options: unknown = {}): VerboseTable[] {
    assertGrid(grid);
    const resolved = this.resolveOptions(grid, options, this.verboseDefaults);
    const regions = this.detector.detect(grid, resolved);

    const tables: VerboseTable[] = [];
    for (const [i, region] of regions.entries()) {
      const headers = this.headerResolver.resolve(region, resolved.frozen);
      const table = this.assembler.assemble(grid, region, headers, i, resolved.frozen);
      if (table) tables.push(table);
    }
    return tables;
  }

  extractCompactTables(grid: Grid | null | undefined, options: unknown = {}): CompactTable[] {
    assertGrid(grid);
    const resolved = this.resolveOptions(grid, options, this.compactDefaults);
    const regions = this.detector.detect(grid, resolved);

    const tables: CompactTable[] = [];
    for (const [i, detected] of regions.entries()) {
      const { region, title } = this.titleDetector.detect(grid, detected);
      const headers = this.headerResolver.resolve(region, resolved.frozen);
      const table = this.compactAssembler.assemble(grid, region, headers, i, title);
      if (table) tables.push(table);
    }
    return tables;
  }

  extractWorkbook(input: unknown, options: unknown = {}): SheetTables<VerboseTable>[] {
    return this.eachSheet(input, (grid) => this.extractTables(grid, options));
  }

  extractCompactWorkbook(input: unknown, options: unknown = {}): SheetTables<CompactTable>[] {
    return this.eachSheet(input, (grid) => this.extractCompactTables(grid, options));
  }

  private eachSheet<T>(input: unknown, extract: (grid: Grid) => T[]): SheetTables<T>[] {
    const { workbook } = workbookSchema.parse(input);

    return workbook.sheets.map((sheet, i) => {
      const sheetName = sheet.name ?? `Sheet${i + 1}`;
      try {
        const tables = extract(this.normalizer.fromSheet(sheet));
        this.logger.debug(`Sheet "${sheetName}": ${tables.length} table(s)`);
        return { sheetName, tables };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Table extraction failed for sheet "${sheetName}": ${message}`);
        throw error;
      }
    });
  }

  private resolveOptions(grid: Grid, raw: unknown, defaults: DetectionDefaults): DetectionOptions {
    const input: TableOptionsInput = tableOptionsSchema.parse(raw);
    return resolveDetectionOptions(input, defaults, grid.frozen);
  }
}
