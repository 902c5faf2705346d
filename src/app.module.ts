import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DomainsModule } from './domains/domains.module';
import { HealthController } from './health.controller';
import { ToolsModule } from './tools/tools.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    DomainsModule,
    ToolsModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
