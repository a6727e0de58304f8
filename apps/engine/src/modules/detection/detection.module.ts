import { Module } from '@nestjs/common';
import { RegionDetectorService } from './region-detector.service';
import { RegionValidatorService } from './region-validator.service';

@Module({
  providers: [RegionDetectorService, RegionValidatorService],
  exports: [RegionDetectorService, RegionValidatorService],
})
export class DetectionModule {}
