import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SurveyResponseOrmEntity } from '../entities/survey-response.orm-entity';
import {
  CreateSurveyResponseInput,
  ISurveyResponseRepository,
} from '../../../domain/survey-response/repositories/survey-response.repository.interface';
import { SurveyResponse } from '../../../domain/survey-response/entities/survey-response.entity';
import { SurveyResponseMapper } from '../mapper/survey-response.mapper';

/**
 * SurveyResponse Repository 구현체
 */
@Injectable()
export class SurveyResponseRepository implements ISurveyResponseRepository {
  constructor(
    @InjectRepository(SurveyResponseOrmEntity)
    private readonly repo: Repository<SurveyResponseOrmEntity>,
  ) {}

  async create(input: CreateSurveyResponseInput): Promise<SurveyResponse> {
    const ormEntity = new SurveyResponseOrmEntity();
    ormEntity.surveyId = input.surveyId;
    ormEntity.oneLinkId = input.oneLinkId;
    ormEntity.answers = input.answers;
    ormEntity.ipAddress = input.ipAddress;
    ormEntity.userAgent = input.userAgent;
    ormEntity.submittedAt = input.submittedAt;

    const saved = await this.repo.save(ormEntity);
    return SurveyResponseMapper.toDomain(saved);
  }
}
