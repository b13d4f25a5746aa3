import { ConfigService } from '@nestjs/config';

/**
 * Reads a numeric setting. Values from .env arrive as strings, so they are
 * converted here; a blank or non-numeric value falls back to the default.
 */
export function readNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }

  const value = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}
