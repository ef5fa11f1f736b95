import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { BackendSelectorService } from './backend-selector.service';

@Module({
  imports: [ConfigModule],
  providers: [BackendSelectorService],
  exports: [BackendSelectorService],
})
export class SelectionModule {}
