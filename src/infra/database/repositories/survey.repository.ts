import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SurveyOrmEntity } from '../entities/survey.orm-entity';
import { SurveyQuestionOrmEntity } from '../entities/survey-question.orm-entity';
import { SurveyMapper } from '../mapper/survey.mapper';
import type { ISurveyRepository } from '../../../domain/survey/repositories/survey.repository.interface';
import { Survey } from '../../../domain/survey/entities/survey.entity';

/**
 * Survey Repository 구현체 (읽기 전용)
 */
@Injectable()
export class SurveyRepository implements ISurveyRepository {
  constructor(
    @InjectRepository(SurveyOrmEntity)
    private readonly surveyRepo: Repository<SurveyOrmEntity>,
    @InjectRepository(SurveyQuestionOrmEntity)
    private readonly questionRepo: Repository<SurveyQuestionOrmEntity>,
  ) {}

  async findByIdWithQuestions(surveyId: number): Promise<Survey | null> {
    const survey = await this.surveyRepo.findOne({ where: { id: surveyId } });
    if (!survey) {
      return null;
    }

    const questions = await this.questionRepo.find({
      where: { surveyId },
      order: { order: 'ASC', id: 'ASC' },
    });

    return SurveyMapper.toDomain(survey, questions);
  }
}
