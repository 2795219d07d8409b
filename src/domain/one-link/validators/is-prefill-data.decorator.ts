import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isPrefillData } from '../type/link-payload.type';

export const IS_PREFILL_DATA = 'isPrefillData';

/**
 * 프리필 매핑 검증 데코레이터
 *
 * 값은 string / number / boolean / null 또는 그 배열만 허용
 * __proto__ 등 예약 키는 거절
 */
export function IsPrefillData(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_PREFILL_DATA,
      validator: {
        validate: (value: unknown): boolean => isPrefillData(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must map each non-reserved key to a scalar or an array of scalars`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
