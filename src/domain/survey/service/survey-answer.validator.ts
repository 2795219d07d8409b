import type { SurveyAnswer } from '../../survey-response/entities/survey-response.entity';
import type { AnswerValue } from '../../survey-response/type/answer-value.type';
import {
  QuestionType,
  SurveyQuestion,
  TableColumn,
  TableColumnType,
} from '../entities/survey.entity';

export enum AnswerViolationKind {
  /** 필수 문항 미응답 */
  REQUIRED_MISSING = 'REQUIRED_MISSING',
  /** 설문에 없는 문항 ID */
  UNKNOWN_QUESTION = 'UNKNOWN_QUESTION',
  /** 문항 유형/설정과 맞지 않는 값 */
  INVALID_VALUE = 'INVALID_VALUE',
}

export interface AnswerViolation {
  kind: AnswerViolationKind;
  questionId: number;
  message: string;
}

/**
 * 응답을 설문 문항 설정과 대조하여 첫 번째 위반을 반환
 *
 * 검사 순서: 필수 문항 누락 → 문항 존재 → 문항별 값
 * @returns 위반이 없으면 null
 */
export function findAnswerViolation(
  questions: SurveyQuestion[],
  answers: SurveyAnswer[],
): AnswerViolation | null {
  const questionById = new Map(questions.map((question) => [question.id, question]));
  const answeredIds = new Set(answers.map((answer) => answer.questionId));

  for (const question of questions) {
    if (question.required && !answeredIds.has(question.id)) {
      return {
        kind: AnswerViolationKind.REQUIRED_MISSING,
        questionId: question.id,
        message: `required question ${question.id} is not answered`,
      };
    }
  }

  for (const answer of answers) {
    const question = questionById.get(answer.questionId);
    if (!question) {
      return {
        kind: AnswerViolationKind.UNKNOWN_QUESTION,
        questionId: answer.questionId,
        message: `question ${answer.questionId} does not belong to the survey`,
      };
    }

    const problem = checkAnswerValue(question, answer.value);
    if (problem) {
      return {
        kind: AnswerViolationKind.INVALID_VALUE,
        questionId: question.id,
        message: `question ${question.id}: ${problem}`,
      };
    }
  }

  return null;
}

/**
 * @returns 문제 설명, 올바르면 null
 */
function checkAnswerValue(question: SurveyQuestion, value: AnswerValue): string | null {
  switch (question.type) {
    case QuestionType.TEXT:
      return typeof value === 'string' ? null : 'answer must be a string';

    case QuestionType.SINGLE: {
      if (typeof value !== 'string') {
        return 'answer must be a string';
      }
      return isOption(question.config.options, value) ? null : `'${value}' is not an option`;
    }

    case QuestionType.MULTIPLE: {
      if (!Array.isArray(value)) {
        return 'answer must be an array of strings';
      }
      const items: unknown[] = value;
      for (const item of items) {
        if (typeof item !== 'string') {
          return 'answer must be an array of strings';
        }
        if (!isOption(question.config.options, item)) {
          return `'${item}' is not an option`;
        }
      }
      return null;
    }

    case QuestionType.TABLE:
      return checkTableAnswer(question, value);

    default:
      return `unsupported question type '${question.type}'`;
  }
}

function checkTableAnswer(question: SurveyQuestion, value: AnswerValue): string | null {
  if (!Array.isArray(value)) {
    return 'answer must be an array of rows';
  }

  const { minRows = 0, maxRows = 0, columns = [] } = question.config;
  if (minRows > 0 && value.length < minRows) {
    return `at least ${minRows} rows are required, got ${value.length}`;
  }
  if (maxRows > 0 && value.length > maxRows) {
    return `at most ${maxRows} rows are allowed, got ${value.length}`;
  }

  const rows: unknown[] = value;
  for (const [rowIndex, row] of rows.entries()) {
    const rowNumber = rowIndex + 1;
    if (!Array.isArray(row)) {
      return `row ${rowNumber} must be an array`;
    }
    if (row.length !== columns.length) {
      return `row ${rowNumber} must have ${columns.length} cells, got ${row.length}`;
    }
    const cells: unknown[] = row;
    for (const [columnIndex, column] of columns.entries()) {
      const problem = checkTableCell(column, cells[columnIndex]);
      if (problem) {
        return `row ${rowNumber} column '${column.label}' ${problem}`;
      }
    }
  }

  return null;
}

function checkTableCell(column: TableColumn, cell: unknown): string | null {
  if (typeof cell !== 'string') {
    return 'must be a string';
  }
  // 빈 칸은 선택 입력으로 간주
  if (cell === '') {
    return null;
  }

  switch (column.type) {
    case TableColumnType.NUMBER:
      return cell.trim() === cell && Number.isFinite(Number(cell)) ? null : 'must be a number';
    case TableColumnType.SELECT:
      return isOption(column.options, cell) ? null : `'${cell}' is not an option`;
    default:
      return null;
  }
}

function isOption(options: string[] | undefined, value: string): boolean {
  return options?.includes(value) ?? false;
}
