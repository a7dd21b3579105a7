import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TAX_CONFIG, TaxConfiguration, validateConfig } from './config.schema';

/**
 * Loads `.env` through @nestjs/config, then validates the merged environment
 * into a typed configuration. Invalid configuration aborts bootstrap.
 */
export function loadConfig(env: Record<string, unknown> = process.env): TaxConfiguration {
  const validationResult = validateConfig(env);
  if (validationResult.isErr()) {
    throw validationResult.error;
  }
  return validationResult.value;
}

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: TAX_CONFIG,
      useFactory: (): TaxConfiguration => loadConfig(),
    },
  ],
  exports: [TAX_CONFIG],
})
export class TypedConfigModule {}
