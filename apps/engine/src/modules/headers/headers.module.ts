import { Module } from '@nestjs/common';
import { HeaderResolverService } from './header-resolver.service';
import { LabelBuilderService } from './label-builder.service';

@Module({
  providers: [HeaderResolverService, LabelBuilderService],
  exports: [HeaderResolverService, LabelBuilderService],
})
export class HeadersModule {}
