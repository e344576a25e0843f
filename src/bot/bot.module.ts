import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { CommonModule } from '../common/common.module';
import { LoginModule } from '../login/login.module';
import { BotApiService } from './bot-api.service';
import { UpdateDispatcherService } from './update-dispatcher.service';

@Module({
  imports: [AccountsModule, CommonModule, LoginModule],
  providers: [BotApiService, UpdateDispatcherService],
})
export class BotModule {}
