import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { SurveyQuestionOrmEntity } from '../entities/survey-question.orm-entity';
import type { IPrefillFieldValidator } from '../../../domain/one-link/ports/prefill-field-validator.port';

/**
 * 설문 문항 기반 prefill 키 검증기
 *
 * 해당 설문의 문항 중 prefill_key가 일치하는 것이 없으면 invalid
 */
@Injectable()
export class SurveyQuestionPrefillValidator implements IPrefillFieldValidator {
  constructor(
    @InjectRepository(SurveyQuestionOrmEntity)
    private readonly repo: Repository<SurveyQuestionOrmEntity>,
  ) {}

  async findInvalidKeys(resourceId: number, keys: string[]): Promise<string[]> {
    if (keys.length === 0) {
      return [];
    }

    const questions = await this.repo.find({
      select: { id: true, prefillKey: true },
      where: { surveyId: resourceId, prefillKey: In(keys) },
    });

    const knownKeys = new Set<string>();
    for (const question of questions) {
      if (question.prefillKey) {
        knownKeys.add(question.prefillKey);
      }
    }

    return keys.filter((key) => !knownKeys.has(key));
  }
}
