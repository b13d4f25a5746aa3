/** Injection token for the configured Minio.Client */
export const MINIO_CLIENT = 'MINIO_CLIENT';
