import { MASKED, maskSensitive } from './winston.config';

describe('maskSensitive', () => {
  it('민감 키의 값을 대소문자 구분 없이 마스킹해야 한다', () => {
    const result = maskSensitive({
      Token: 'abc',
      refreshToken: 'def',
      Authorization: 'Bearer test-secret',
      surveyId: 42,
    });

    expect(result).toEqual({
      Token: MASKED,
      refreshToken: MASKED,
      Authorization: MASKED,
      surveyId: 42,
    });
  });

  it('중첩 객체와 배열 내부도 마스킹해야 한다', () => {
    const result = maskSensitive({
      request: { body: { token: 'abc', answers: [{ questionId: 1, value: 'x' }] } },
      links: [{ token: 'a' }, { token: 'b' }],
    });

    expect(result).toEqual({
      request: { body: { token: MASKED, answers: [{ questionId: 1, value: 'x' }] } },
      links: [{ token: MASKED }, { token: MASKED }],
    });
  });

  it('프리필 데이터는 개인정보로 간주해 통째로 마스킹해야 한다', () => {
    expect(maskSensitive({ prefillData: { name: 'Alice' } })).toEqual({ prefillData: MASKED });
  });

  it('원본 객체를 변경하지 않아야 한다', () => {
    const original = { password: 'test-secret', nested: { secret: 'x' } };

    maskSensitive(original);

    expect(original).toEqual({ password: 'test-secret', nested: { secret: 'x' } });
  });

  it('원시값, null, Date는 그대로 반환해야 한다', () => {
    const date = new Date('2026-03-01T00:00:00.000Z');

    expect(maskSensitive('plain')).toBe('plain');
    expect(maskSensitive(null)).toBeNull();
    expect(maskSensitive(date)).toBe(date);
  });
});
