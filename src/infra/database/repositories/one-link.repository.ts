import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, LessThan, Repository } from 'typeorm';
import { OneLinkOrmEntity } from '../entities/one-link.orm-entity';
import {
  CreateOneLinkInput,
  IOneLinkRepository,
} from '../../../domain/one-link/repositories/one-link.repository.interface';
import { OneLink } from '../../../domain/one-link/entities/one-link.entity';
import { OneLinkMapper } from '../mapper/one-link.mapper';

/**
 * OneLink Repository 구현체
 *
 * TypeORM을 사용한 OneLink 영속성 관리
 * 상태 전이는 조건부 UPDATE 한 번으로 처리하여 단일 레코드 원자성 보장
 */
@Injectable()
export class OneLinkRepository implements IOneLinkRepository {
  constructor(
    @InjectRepository(OneLinkOrmEntity)
    private readonly repo: Repository<OneLinkOrmEntity>,
  ) {}

  async create(input: CreateOneLinkInput): Promise<OneLink> {
    const ormEntity = new OneLinkOrmEntity();
    ormEntity.surveyId = input.resourceId;
    ormEntity.token = input.token;
    ormEntity.prefillData = input.prefillSnapshot;
    ormEntity.expiresAt = input.expiresAt;
    ormEntity.used = false;
    ormEntity.usedAt = null;
    ormEntity.accessedAt = null;

    const saved = await this.repo.save(ormEntity);
    return OneLinkMapper.toDomain(saved);
  }

  async findByToken(token: string): Promise<OneLink | null> {
    const found = await this.repo.findOne({ where: { token } });
    return found ? OneLinkMapper.toDomain(found) : null;
  }

  async markUsed(id: number, usedAt: Date): Promise<boolean> {
    // used=false 인 경우에만 전이 (usedAt은 최초 1회만 기록)
    const result = await this.repo.update({ id, used: false }, { used: true, usedAt });
    if ((result.affected ?? 0) > 0) {
      return true;
    }
    // 이미 사용된 레코드면 멱등 성공, 없으면 NotFound
    return this.repo.exists({ where: { id } });
  }

  async markAccessedIfUnset(id: number, accessedAt: Date): Promise<void> {
    await this.repo.update({ id, accessedAt: IsNull() }, { accessedAt });
  }

  async deleteExpired(now: Date): Promise<number> {
    const result = await this.repo.delete({ expiresAt: LessThan(now) });
    return result.affected ?? 0;
  }
}
