import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * 표 문항 열 설정 (저장 형식)
 */
export interface TableColumnRecord {
  id: string;
  type: string;
  label: string;
  options?: string[];
}

/**
 * 문항 설정 JSON (저장 형식, snake_case)
 */
export interface QuestionConfigRecord {
  options?: string[];
  columns?: TableColumnRecord[];
  min_rows?: number;
  max_rows?: number;
  can_add_row?: boolean;
}

/**
 * 설문 문항 ORM 엔티티 (읽기 전용)
 *
 * questions 테이블은 설문 작성 기능이 관리한다.
 * prefill 키 검증, 링크 열람, 응답 검증에 사용.
 */
@Entity({ name: 'questions', synchronize: false })
export class SurveyQuestionOrmEntity {
  @PrimaryColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'survey_id', type: 'int' })
  @Index()
  surveyId!: number;

  /** text | single | multiple | table */
  @Column({ type: 'varchar', length: 20 })
  type!: string;

  @Column({ type: 'varchar', length: 500 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'boolean', default: false })
  required!: boolean;

  @Column({ name: 'order', type: 'int' })
  order!: number;

  @Column({ type: 'json', nullable: true })
  config!: QuestionConfigRecord | null;

  @Column({ name: 'prefill_key', type: 'varchar', length: 100, nullable: true })
  prefillKey!: string | null;
}
