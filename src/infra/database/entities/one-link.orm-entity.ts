import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import type { PrefillData } from '../../../domain/one-link/type/link-payload.type';

/**
 * OneLink ORM 엔티티
 *
 * one_links 테이블과 매핑
 */
@Entity('one_links')
export class OneLinkOrmEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'survey_id', type: 'int' })
  @Index()
  surveyId!: number;

  /** 토큰 길이는 프리필 크기에 비례하므로 길이 제한 없음 */
  @Column({ type: 'text', unique: true })
  token!: string;

  @Column({ name: 'prefill_data', type: 'jsonb', nullable: true })
  prefillData!: PrefillData | null;

  @Column({ name: 'expires_at', type: 'timestamptz' })
  @Index()
  expiresAt!: Date;

  @Column({ type: 'boolean', default: false })
  @Index()
  used!: boolean;

  @Column({ name: 'used_at', type: 'timestamptz', nullable: true })
  usedAt!: Date | null;

  @Column({ name: 'accessed_at', type: 'timestamptz', nullable: true })
  accessedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
