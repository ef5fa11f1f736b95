import { HttpModule, HttpService } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { ConfigService } from '../config/config.service';
import { BackendRegistry } from './backend-registry';

@Module({
  imports: [HttpModule, ConfigModule],
  providers: [
    {
      provide: BackendRegistry,
      useFactory: (config: ConfigService, httpService: HttpService) => BackendRegistry.fromConfig(config, httpService),
      inject: [ConfigService, HttpService],
    },
  ],
  exports: [BackendRegistry],
})
export class BackendsModule {}
