import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LinkTokenCodec } from './service/link-token-codec';
import { LinkEncryptionKey } from './value-objects/link-encryption-key.vo';

/**
 * OneLink 도메인 모듈
 *
 * 암호화 키는 부팅 시 한 번 파싱/검증되며, 잘못된 키면 애플리케이션이 시작되지 않음
 * - ONE_LINK_ENCRYPTION_KEY: 32바이트 키 (base64 / hex / 원문)
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: LinkTokenCodec,
      useFactory: (configService: ConfigService) => {
        const rawKey = configService.get<string>('ONE_LINK_ENCRYPTION_KEY');
        if (!rawKey) {
          throw new Error('ONE_LINK_ENCRYPTION_KEY is not set');
        }
        return new LinkTokenCodec(LinkEncryptionKey.parse(rawKey));
      },
      inject: [ConfigService],
    },
  ],
  exports: [LinkTokenCodec],
})
export class OneLinkDomainModule {}
