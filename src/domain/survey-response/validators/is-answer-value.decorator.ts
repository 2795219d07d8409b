import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isAnswerValue } from '../type/answer-value.type';

export const IS_ANSWER_VALUE = 'isAnswerValue';

/**
 * 응답 값 형태 검증 데코레이터
 *
 * 문항 설정과의 일치 여부는 제출 처리에서 확인한다.
 */
export function IsAnswerValue(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_ANSWER_VALUE,
      validator: {
        validate: (value: unknown): boolean => isAnswerValue(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be a scalar, an array of scalars or rows of strings`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
