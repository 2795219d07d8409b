import { ConfigService } from '@nestjs/config';
import { createOneLinkOptions } from './one-link.options';

describe('createOneLinkOptions', () => {
  it('환경변수가 없으면 기본값을 사용해야 한다', () => {
    const options = createOneLinkOptions(new ConfigService({}));

    expect(options).toEqual({
      baseUrl: 'http://localhost:3000',
      defaultExpirySeconds: 3600,
      maxExpirySeconds: 2592000,
      lockTtlMs: 10000,
    });
  });

  it('문자열 환경변수를 숫자로 변환하고 끝 슬래시를 제거해야 한다', () => {
    const options = createOneLinkOptions(
      new ConfigService({
        ONE_LINK_BASE_URL: 'https://survey.example.com/',
        ONE_LINK_DEFAULT_EXPIRY_SECONDS: '600',
        ONE_LINK_MAX_EXPIRY_SECONDS: '86400',
        ONE_LINK_LOCK_TTL_MS: '5000',
      }),
    );

    expect(options).toEqual({
      baseUrl: 'https://survey.example.com',
      defaultExpirySeconds: 600,
      maxExpirySeconds: 86400,
      lockTtlMs: 5000,
    });
  });

  it('양의 정수가 아니면 부팅을 막아야 한다', () => {
    expect(() =>
      createOneLinkOptions(new ConfigService({ ONE_LINK_LOCK_TTL_MS: 'abc' })),
    ).toThrow('ONE_LINK_LOCK_TTL_MS must be a positive integer, got "abc"');
  });

  it('기본 유효 기간이 최대 유효 기간보다 길면 부팅을 막아야 한다', () => {
    expect(() =>
      createOneLinkOptions(
        new ConfigService({
          ONE_LINK_DEFAULT_EXPIRY_SECONDS: '7200',
          ONE_LINK_MAX_EXPIRY_SECONDS: '3600',
        }),
      ),
    ).toThrow('ONE_LINK_DEFAULT_EXPIRY_SECONDS (7200) exceeds ONE_LINK_MAX_EXPIRY_SECONDS (3600)');
  });
});
