import { Module } from '@nestjs/common';
import { GridNormalizerService } from './grid-normalizer.service';

@Module({
  providers: [GridNormalizerService],
  exports: [GridNormalizerService],
})
export class GridModule {}
