/**
 * 설문 상태
 */
export enum SurveyStatus {
  DRAFT = 'draft',
  PUBLISHED = 'published',
}

/**
 * 문항 유형
 */
export enum QuestionType {
  TEXT = 'text',
  SINGLE = 'single',
  MULTIPLE = 'multiple',
  TABLE = 'table',
}

/**
 * 표 문항 열 유형
 */
export enum TableColumnType {
  TEXT = 'text',
  NUMBER = 'number',
  SELECT = 'select',
}

export interface TableColumn {
  id: string;
  type: string;
  label: string;
  /** select 열의 선택지 */
  options?: string[];
}

/**
 * 문항 유형별 설정
 * - single / multiple: options
 * - table: columns, minRows, maxRows, canAddRow
 */
export interface QuestionConfig {
  options?: string[];
  columns?: TableColumn[];
  minRows?: number;
  maxRows?: number;
  canAddRow?: boolean;
}

export interface SurveyQuestionProps {
  id: number;
  surveyId: number;
  type: string;
  title: string;
  description?: string;
  required?: boolean;
  order: number;
  config?: QuestionConfig;
  prefillKey?: string | null;
}

/**
 * SurveyQuestion 도메인 엔티티
 *
 * 설문 작성 기능이 관리하는 문항. 여기서는 열람과 응답 검증에만 사용한다.
 */
export class SurveyQuestion {
  id: number;
  surveyId: number;
  /** 저장된 값 그대로 (알 수 없는 유형은 응답 검증에서 거절) */
  type: string;
  title: string;
  description: string;
  required: boolean;
  order: number;
  config: QuestionConfig;
  prefillKey: string | null;

  constructor(props: SurveyQuestionProps) {
    this.id = props.id;
    this.surveyId = props.surveyId;
    this.type = props.type;
    this.title = props.title;
    this.description = props.description ?? '';
    this.required = props.required ?? false;
    this.order = props.order;
    this.config = props.config ?? {};
    this.prefillKey = props.prefillKey || null;
  }
}

export interface SurveyProps {
  id: number;
  title: string;
  description?: string;
  status: string;
  questions?: SurveyQuestion[];
}

/**
 * Survey 도메인 엔티티 (문항 포함)
 */
export class Survey {
  id: number;
  title: string;
  description: string;
  status: string;
  /** 표시 순서(order)로 정렬된 문항 */
  questions: SurveyQuestion[];

  constructor(props: SurveyProps) {
    this.id = props.id;
    this.title = props.title;
    this.description = props.description ?? '';
    this.status = props.status;
    this.questions = props.questions ?? [];
  }

  isPublished(): boolean {
    return this.status === SurveyStatus.PUBLISHED;
  }
}
