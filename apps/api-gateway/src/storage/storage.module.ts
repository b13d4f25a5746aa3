import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { readNumber } from '../config/config.utils';
import { MINIO_CLIENT } from './storage.constants';
import { StorageService } from './storage.service';

/**
 * StorageModule — provides object storage access via MinIO.
 *
 * The Minio.Client is built from configuration and injected into
 * StorageService under MINIO_CLIENT, so the service can be tested
 * against a client whose calls are stubbed.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: MINIO_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Minio.Client =>
        new Minio.Client({
          endPoint: configService.get<string>('MINIO_ENDPOINT', 'localhost'),
          port: readNumber(configService, 'MINIO_PORT', 9000),
          useSSL: configService.get<string>('MINIO_USE_SSL', 'false') === 'true',
          accessKey: configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
          secretKey: configService.get<string>('MINIO_SECRET_KEY', 'minioadmin_secret'),
        }),
    },
    StorageService,
  ],
  exports: [StorageService],
})
export class StorageModule {}
