import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { envValidationSchema } from './config/env.validation';
import { FeedbackModule } from './modules/feedback/feedback.module';

export type AppModuleOptions = {
  envFilePath?: string;
};

@Module({})
export class AppModule {
  static forRoot(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: options.envFilePath ?? '.env',
          load: [configuration],
          validationSchema: envValidationSchema,
        }),
        FeedbackModule,
      ],
    };
  }
}
