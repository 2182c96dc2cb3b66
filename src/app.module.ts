import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DcaModule } from './dca/dca.module';
import configuration from './config/configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    DcaModule,
  ],
})
export class AppModule {}
