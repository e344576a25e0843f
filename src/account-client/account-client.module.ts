import { Module } from '@nestjs/common';
import { AccountClientService } from './account-client.service';

@Module({
  providers: [AccountClientService],
  exports: [AccountClientService],
})
export class AccountClientModule {}
