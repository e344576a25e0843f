import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { BotUser } from './bot-user.entity';
import { bigintTransformer } from './bigint.transformer';

/**
 * Reference to a persisted account-client session.
 * At most one row per (user, phone number); writes replace the existing row.
 */
@Entity('account_sessions')
@Index('uq_account_sessions_user_phone', ['userId', 'phoneNumber'], { unique: true })
export class AccountSession {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'bigint', transformer: bigintTransformer })
  userId!: number;

  @ManyToOne(() => BotUser, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: BotUser;

  @Column({ name: 'phone_number', length: 32 })
  phoneNumber!: string;

  @Column({ name: 'session_ref', type: 'text' })
  sessionRef!: string;

  @Column({ name: 'is_active', default: true })
  isActive!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
