import { isPrefillValue, type PrefillValue } from '../../one-link/type/link-payload.type';

/**
 * 표 문항 응답 (행 × 열 문자열)
 */
export type TableAnswer = string[][];

/**
 * 문항별 응답 값
 *
 * 텍스트/단일 선택: 스칼라, 다중 선택: 스칼라 배열, 표: 2차원 문자열 배열
 */
export type AnswerValue = PrefillValue | TableAnswer;

export function isTableAnswer(value: unknown): value is TableAnswer {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

export function isAnswerValue(value: unknown): value is AnswerValue {
  return isPrefillValue(value) || isTableAnswer(value);
}
