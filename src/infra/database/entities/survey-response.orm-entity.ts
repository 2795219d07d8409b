import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import type { SurveyAnswer } from '../../../domain/survey-response/entities/survey-response.entity';

/**
 * SurveyResponse ORM 엔티티
 *
 * survey_responses 테이블과 매핑
 * one_link_id 유니크 제약으로 링크당 응답 1건 보장
 */
@Entity('survey_responses')
export class SurveyResponseOrmEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'survey_id', type: 'int' })
  @Index()
  surveyId!: number;

  @Column({ name: 'one_link_id', type: 'int', unique: true })
  oneLinkId!: number;

  @Column({ type: 'jsonb' })
  answers!: SurveyAnswer[];

  @Column({ name: 'ip_address', type: 'varchar', length: 64 })
  ipAddress!: string;

  @Column({ name: 'user_agent', type: 'varchar', length: 512 })
  userAgent!: string;

  @Column({ name: 'submitted_at', type: 'timestamptz' })
  submittedAt!: Date;
}
