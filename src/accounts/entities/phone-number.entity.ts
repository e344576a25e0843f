import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { BotUser } from './bot-user.entity';
import { bigintTransformer } from './bigint.transformer';

export enum PhoneNumberStatus {
  PENDING = 'pending',
  AUTHENTICATED = 'authenticated',
  FAILED = 'failed',
}

/**
 * One phone number submission. The same number may be submitted more than once.
 */
@Entity('phone_numbers')
@Index('idx_phone_numbers_user_id', ['userId'])
export class PhoneNumber {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'user_id', type: 'bigint', transformer: bigintTransformer })
  userId!: number;

  @ManyToOne(() => BotUser, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: BotUser;

  @Column({ name: 'phone_number', length: 32 })
  phoneNumber!: string;

  @Column({ name: 'is_authenticated', default: false })
  isAuthenticated!: boolean;

  @Column({ type: 'varchar', length: 16, default: PhoneNumberStatus.PENDING })
  status!: PhoneNumberStatus;

  @CreateDateColumn({ name: 'added_at', type: 'timestamptz' })
  addedAt!: Date;

  @Column({ name: 'last_login_at', type: 'timestamptz', nullable: true })
  lastLoginAt!: Date | null;
}
