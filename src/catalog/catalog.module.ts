import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CatalogEntry } from './entities/catalog-entry.entity';
import { CatalogSessionService } from './services/catalog-session.service';
import { CatalogMapperService } from './services/catalog-mapper.service';
import { CatalogImportService } from './services/catalog-import.service';
import { CatalogController } from './catalog.controller';

@Module({
  imports: [TypeOrmModule.forFeature([CatalogEntry])],
  providers: [CatalogSessionService, CatalogMapperService, CatalogImportService],
  exports: [CatalogSessionService, CatalogMapperService, CatalogImportService],
  controllers: [CatalogController],
})
export class CatalogModule {}
