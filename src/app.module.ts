import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from './common/logger/logger.module';
import { CatalogModule } from './catalog/catalog.module';
import { ReportModule } from './report/report.module';
import { CatalogEntry } from './catalog/entities/catalog-entry.entity';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'mysql',
        host: configService.get<string>('DATABASE_HOST', 'localhost'),
        port: Number(configService.get<string>('DATABASE_PORT', '3306')),
        username: configService.get<string>('DATABASE_USERNAME', 'root'),
        password: configService.get<string>('DATABASE_PASSWORD', ''),
        database: configService.get<string>('DATABASE_NAME', 'project_ledger'),
        entities: [CatalogEntry],
        synchronize: configService.get<string>('NODE_ENV') !== 'production',
        charset: 'utf8mb4',
      }),
    }),
    LoggerModule,
    CatalogModule,
    ReportModule,
  ],
})
export class AppModule {}
