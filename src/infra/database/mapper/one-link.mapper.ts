import { OneLink } from '../../../domain/one-link/entities/one-link.entity';
import { OneLinkOrmEntity } from '../entities/one-link.orm-entity';

/**
 * OneLink Mapper
 *
 * ORM 엔티티와 도메인 엔티티 간의 변환 담당
 */
export class OneLinkMapper {
  /**
   * ORM 엔티티를 도메인 엔티티로 변환
   */
  static toDomain(ormEntity: OneLinkOrmEntity): OneLink {
    return new OneLink({
      id: ormEntity.id,
      resourceId: ormEntity.surveyId,
      token: ormEntity.token,
      prefillSnapshot: ormEntity.prefillData,
      expiresAt: ormEntity.expiresAt,
      used: ormEntity.used,
      usedAt: ormEntity.usedAt,
      firstAccessedAt: ormEntity.accessedAt,
      createdAt: ormEntity.createdAt,
    });
  }
}
