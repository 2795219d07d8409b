import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * 설문 ORM 엔티티 (읽기 전용)
 *
 * surveys 테이블은 설문 작성 기능이 관리하며,
 * 여기서는 열람과 응답 검증에 필요한 컬럼만 매핑한다.
 */
@Entity({ name: 'surveys', synchronize: false })
export class SurveyOrmEntity {
  @PrimaryColumn({ type: 'int' })
  id!: number;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  /** draft | published */
  @Column({ type: 'varchar', length: 20, default: 'draft' })
  @Index()
  status!: string;
}
