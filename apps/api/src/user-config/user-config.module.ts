import { Module } from '@nestjs/common';
import { UserConfigStore } from './user-config.store';

@Module({
  providers: [UserConfigStore],
  exports: [UserConfigStore],
})
export class UserConfigModule {}
