import { Module } from '@nestjs/common';
import { TokenStore } from './token-store.service';

@Module({
  providers: [TokenStore],
  exports: [TokenStore],
})
export class TokensModule {}
