import { Module } from '@nestjs/common';
import { CryptoModule } from '../crypto/crypto.module';
import { TraktModule } from '../trakt/trakt.module';
import { CredentialStoreService } from './credential-store.service';

@Module({
  imports: [CryptoModule, TraktModule],
  providers: [CredentialStoreService],
  exports: [CredentialStoreService],
})
export class CredentialsModule {}
