import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { DrizzleFilesRepository } from './drizzle-files.repository';
import { FileStorage } from './file-storage';
import { FilesRepository } from './files.repository';
import { FilesService } from './files.service';
import { S3FileStorage } from './s3-file-storage';

@Module({
  imports: [AppConfigModule],
  providers: [
    FilesService,
    { provide: FilesRepository, useClass: DrizzleFilesRepository },
    { provide: FileStorage, useClass: S3FileStorage },
  ],
  exports: [FilesService],
})
export class FilesModule {}
