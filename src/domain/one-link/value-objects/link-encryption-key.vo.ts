/**
 * 링크 암호화 키 값 객체 (Value Object)
 *
 * AES-256 용 32바이트 키. 프로세스 시작 시 한 번 파싱/검증되어
 * LinkTokenCodec 생성자에 주입됩니다.
 *
 * 허용 형식:
 * - base64 (32바이트로 디코딩되는 44자 문자열)
 * - hex (64자)
 * - 32바이트 원문 문자열
 */
export class LinkEncryptionKey {
  static readonly KEY_LENGTH = 32;

  private readonly _bytes: Buffer;

  private constructor(bytes: Buffer) {
    this._bytes = Buffer.from(bytes);
  }

  static fromBytes(bytes: Buffer): LinkEncryptionKey {
    if (bytes.length !== LinkEncryptionKey.KEY_LENGTH) {
      throw new Error(
        `encryption key must be exactly ${LinkEncryptionKey.KEY_LENGTH} bytes, got ${bytes.length} bytes`,
      );
    }
    return new LinkEncryptionKey(bytes);
  }

  /**
   * 설정 문자열에서 키 생성
   * @throws 길이가 맞지 않으면 에러
   */
  static parse(raw: string): LinkEncryptionKey {
    const value = raw.trim();

    if (/^[0-9a-fA-F]{64}$/.test(value)) {
      return LinkEncryptionKey.fromBytes(Buffer.from(value, 'hex'));
    }

    if (value.length === 44 && /^[A-Za-z0-9+/]{43}=$/.test(value)) {
      return LinkEncryptionKey.fromBytes(Buffer.from(value, 'base64'));
    }

    return LinkEncryptionKey.fromBytes(Buffer.from(value, 'utf8'));
  }

  /**
   * 키 바이트 복사본 반환
   */
  get bytes(): Buffer {
    return Buffer.from(this._bytes);
  }

  toString(): string {
    return 'LinkEncryptionKey(***)';
  }
}
