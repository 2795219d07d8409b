/**
 * ============================================================
 * 📦 Survey Repository 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - findByIdWithQuestions: 설문 + 문항 조회 및 도메인 변환
 *
 * ⚠️ 중요 고려사항:
 *   - 실제 DB 대신 Mock Repository 사용
 *   - 문항 설정 JSON은 snake_case로 저장되어 있다
 * ============================================================
 */
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SurveyRepository } from './survey.repository';
import { SurveyOrmEntity } from '../entities/survey.orm-entity';
import { SurveyQuestionOrmEntity } from '../entities/survey-question.orm-entity';

describe('SurveyRepository', () => {
  let repository: SurveyRepository;
  let mockSurveyRepo: jest.Mocked<Repository<SurveyOrmEntity>>;
  let mockQuestionRepo: jest.Mocked<Repository<SurveyQuestionOrmEntity>>;

  const buildSurvey = (): SurveyOrmEntity => {
    const entity = new SurveyOrmEntity();
    entity.id = 42;
    entity.title = '만족도 조사';
    entity.description = null;
    entity.status = 'published';
    return entity;
  };

  const buildQuestion = (overrides: Partial<SurveyQuestionOrmEntity>): SurveyQuestionOrmEntity => {
    const entity = new SurveyQuestionOrmEntity();
    entity.id = 1;
    entity.surveyId = 42;
    entity.type = 'text';
    entity.title = '이름';
    entity.description = null;
    entity.required = false;
    entity.order = 1;
    entity.config = null;
    entity.prefillKey = null;
    return Object.assign(entity, overrides);
  };

  beforeEach(async () => {
    mockSurveyRepo = {
      findOne: jest.fn(),
    } as unknown as jest.Mocked<Repository<SurveyOrmEntity>>;
    mockQuestionRepo = {
      find: jest.fn(),
    } as unknown as jest.Mocked<Repository<SurveyQuestionOrmEntity>>;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SurveyRepository,
        { provide: getRepositoryToken(SurveyOrmEntity), useValue: mockSurveyRepo },
        { provide: getRepositoryToken(SurveyQuestionOrmEntity), useValue: mockQuestionRepo },
      ],
    }).compile();

    repository = module.get<SurveyRepository>(SurveyRepository);
  });

  it('설문이 없으면 문항을 조회하지 않고 null을 반환해야 한다', async () => {
    mockSurveyRepo.findOne.mockResolvedValue(null);

    await expect(repository.findByIdWithQuestions(42)).resolves.toBeNull();
    expect(mockQuestionRepo.find).not.toHaveBeenCalled();
  });

  it('문항을 표시 순서로 조회하고 도메인 엔티티로 변환해야 한다', async () => {
    // 📥 GIVEN
    mockSurveyRepo.findOne.mockResolvedValue(buildSurvey());
    mockQuestionRepo.find.mockResolvedValue([
      buildQuestion({ id: 1, required: true, prefillKey: 'name' }),
      buildQuestion({
        id: 2,
        type: 'table',
        title: '일정',
        order: 2,
        config: {
          columns: [{ id: 'day', type: 'select', label: '요일', options: ['mon'] }],
          min_rows: 1,
          max_rows: 3,
          can_add_row: true,
        },
      }),
    ]);

    // 🎬 WHEN
    const survey = await repository.findByIdWithQuestions(42);

    // ✅ THEN
    expect(mockSurveyRepo.findOne).toHaveBeenCalledWith({ where: { id: 42 } });
    expect(mockQuestionRepo.find).toHaveBeenCalledWith({
      where: { surveyId: 42 },
      order: { order: 'ASC', id: 'ASC' },
    });
    expect(survey?.title).toBe('만족도 조사');
    expect(survey?.description).toBe('');
    expect(survey?.isPublished()).toBe(true);
    expect(survey?.questions.map((q) => [q.id, q.required, q.prefillKey])).toEqual([
      [1, true, 'name'],
      [2, false, null],
    ]);
    expect(survey?.questions[0].config).toEqual({});
    expect(survey?.questions[1].config).toEqual({
      columns: [{ id: 'day', type: 'select', label: '요일', options: ['mon'] }],
      minRows: 1,
      maxRows: 3,
      canAddRow: true,
    });
  });
});
