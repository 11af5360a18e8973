import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { CatalogImportService } from '../src/catalog/services/catalog-import.service';

// 사용법: import-catalog [워크북 경로] | import-catalog --status
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);
  const [argument] = process.argv.slice(2);

  try {
    const importService = app.get(CatalogImportService);

    if (argument === '--status') {
      const report = await importService.getStatusReport();
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    const result = await importService.importFromFile(argument);
    console.log(
      `Catalog import completed: ${result.imported} imported, ${result.skipped} skipped, ${result.duplicates} duplicates`,
    );
    for (const error of result.errors) {
      console.warn(error);
    }
  } catch (error) {
    console.error('Failed to import master catalog:', error);
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

void bootstrap();
