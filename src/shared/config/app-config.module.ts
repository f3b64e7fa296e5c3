import { Global, Module } from '@nestjs/common';
import { INJECTION_TOKENS } from '../constants/injection-tokens';
import { loadAppConfig } from './app.config';

@Global()
@Module({
  providers: [
    {
      provide: INJECTION_TOKENS.APP_CONFIG,
      useFactory: () => loadAppConfig(),
    },
  ],
  exports: [INJECTION_TOKENS.APP_CONFIG],
})
export class AppConfigModule {}
