/**
 * 링크 암호화 키 생성 스크립트
 *
 * ONE_LINK_ENCRYPTION_KEY에 넣을 32바이트 키를 base64로 출력합니다.
 *
 * 사용법:
 *   npm run generate:key
 */

import { randomBytes } from 'crypto';
import { LinkEncryptionKey } from '../src/domain/one-link/value-objects/link-encryption-key.vo';

const encoded = randomBytes(LinkEncryptionKey.KEY_LENGTH).toString('base64');

// 출력 값이 그대로 파싱되는지 확인
LinkEncryptionKey.parse(encoded);

console.log(`ONE_LINK_ENCRYPTION_KEY=${encoded}`);
