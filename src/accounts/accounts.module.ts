import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AccountStoreService } from './account-store.service';
import { BotUser } from './entities/bot-user.entity';
import { PhoneNumber } from './entities/phone-number.entity';
import { AccountSession } from './entities/account-session.entity';

@Module({
  imports: [TypeOrmModule.forFeature([BotUser, PhoneNumber, AccountSession])],
  providers: [AccountStoreService],
  exports: [AccountStoreService],
})
export class AccountsModule {}
