import { Module } from '@nestjs/common';
import { AccountClientModule } from '../account-client/account-client.module';
import { AccountsModule } from '../accounts/accounts.module';
import { CommonModule } from '../common/common.module';
import { ConversationStateService } from './conversation-state.service';
import { LoginOrchestratorService } from './login-orchestrator.service';
import { PendingAuthRegistry } from './pending-auth.registry';
import { LoginFlowSweeperService } from './services/login-flow-sweeper.service';

@Module({
  imports: [AccountClientModule, AccountsModule, CommonModule],
  providers: [
    ConversationStateService,
    PendingAuthRegistry,
    LoginOrchestratorService,
    LoginFlowSweeperService,
  ],
  exports: [LoginOrchestratorService, ConversationStateService],
})
export class LoginModule {}
