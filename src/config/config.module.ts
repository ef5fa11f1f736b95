import { Module } from '@nestjs/common';
import { ConfigService } from './config.service';
import { VaultModule } from '../vault/vault.module';
import { VaultService } from '../vault/vault.service';

@Module({
  imports: [VaultModule],
  providers: [
    {
      provide: ConfigService,
      useFactory: (vaultService: VaultService) => ConfigService.load(process.env, vaultService),
      inject: [VaultService],
    },
  ],
  exports: [ConfigService],
})
export class ConfigModule {}
