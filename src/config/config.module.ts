import { Global, Module } from '@nestjs/common';
import dotenv from 'dotenv';
import { ANALYTICS_CONFIG, loadAnalyticsConfig } from './analytics.config';
import { CLOCK, SystemClock } from '../common/clock';

@Global()
@Module({
  providers: [
    {
      provide: ANALYTICS_CONFIG,
      useFactory: () => {
        dotenv.config();
        return loadAnalyticsConfig(process.env);
      },
    },
    { provide: CLOCK, useClass: SystemClock },
  ],
  exports: [ANALYTICS_CONFIG, CLOCK],
})
export class ConfigModule {}
