import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { IsPrefillData } from '../validators/is-prefill-data.decorator';
import { isPrefillData, type LinkPayload } from '../type/link-payload.type';

/**
 * 토큰 평문(JSON) 스키마
 *
 * 짧은 키를 사용해 토큰 길이를 줄인다.
 * - rid: resourceId
 * - pf: prefill
 * - exp: expiresAtEpochSeconds
 */
export class SealedLinkPayload {
  @IsInt()
  @Min(1)
  rid!: number;

  /** 검증 전에는 임의 JSON 값일 수 있다 */
  @IsOptional()
  @IsPrefillData()
  pf?: unknown;

  @IsInt()
  exp!: number;

  @IsString()
  @IsNotEmpty()
  nonce!: string;

  static fromPayload(payload: LinkPayload): SealedLinkPayload {
    const sealed = new SealedLinkPayload();
    sealed.rid = payload.resourceId;
    if (payload.prefill !== undefined) {
      sealed.pf = payload.prefill;
    }
    sealed.exp = payload.expiresAtEpochSeconds;
    sealed.nonce = payload.nonce;
    return sealed;
  }

  toPayload(): LinkPayload {
    const payload: LinkPayload = {
      resourceId: this.rid,
      expiresAtEpochSeconds: this.exp,
      nonce: this.nonce,
    };
    if (isPrefillData(this.pf)) {
      payload.prefill = this.pf;
    }
    return payload;
  }
}
