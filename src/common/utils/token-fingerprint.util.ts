const FINGERPRINT_LENGTH = 12;

/**
 * 로그용 토큰 식별자 (앞 12자)
 *
 * 토큰 전체는 그 자체로 자격 증명이므로 로그에 남기지 않는다.
 */
export function tokenFingerprint(token: string): string {
  if (token.length <= FINGERPRINT_LENGTH) {
    return token;
  }
  return `${token.slice(0, FINGERPRINT_LENGTH)}…`;
}
