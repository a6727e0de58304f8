import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.config';
import { GridModule } from './modules/grid/grid.module';
import { DetectionModule } from './modules/detection/detection.module';
import { HeadersModule } from './modules/headers/headers.module';
import { TablesModule } from './modules/tables/tables.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, validate: validateEnv }),
    GridModule,
    DetectionModule,
    HeadersModule,
    TablesModule,
  ],
})
export class AppModule {}
