import { setImmediate } from 'timers/promises';
import { Test } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { mock, MockProxy } from 'jest-mock-extended';
import { GeneratorNotConfiguredError } from '@app/company-generator/error/GeneratorNotConfiguredError';
import { CompanyPayload } from '@app/company-generator/model/CompanyLead';
import { LeadEnhancer } from '@app/lead-job/collaborator/LeadEnhancer';
import { LeadGenerator } from '@app/lead-job/collaborator/LeadGenerator';
import { JobStatus } from '@app/lead-job/model/JobStatus';
import { Sleeper } from '@app/resilience/sleeper/Sleeper';
import { aCompany, aPayload } from '../../../../libs/lead-job/test/fixture/companies';
import { setNestApp } from '../../src/setNestApp';
import { ApiModule } from '../../src/ApiModule';

describe('LeadController', () => {
  const body = { industry: 'robotics', count: 3, country: 'Germany' };

  let app: INestApplication;
  let generator: MockProxy<LeadGenerator>;
  let enhancer: MockProxy<LeadEnhancer>;
  let sleeper: MockProxy<Sleeper>;

  beforeEach(async () => {
    generator = mock<LeadGenerator>();
    enhancer = mock<LeadEnhancer>();
    sleeper = mock<Sleeper>();
    sleeper.sleep.mockResolvedValue(undefined);

    const module = await Test.createTestingModule({
      imports: [ApiModule],
    })
      .overrideProvider(LeadGenerator)
      .useValue(generator)
      .overrideProvider(LeadEnhancer)
      .useValue(enhancer)
      .overrideProvider(Sleeper)
      .useValue(sleeper)
      .compile();

    app = module.createNestApplication();
    setNestApp(app);

    await app.init();
  });

  afterEach(async () => app.close());

  function overloaded(): Error {
    return Object.assign(new Error('model overloaded'), { status: 503 });
  }

  function blockGeneratorUntilAbort(): void {
    generator.generate.mockImplementation(
      (_, signal) =>
        new Promise<CompanyPayload>((_resolve, reject) => {
          signal?.addEventListener('abort', () =>
            reject(new Error('request aborted')),
          );
        }),
    );
  }

  async function submit(): Promise<string> {
    const response = await request(app.getHttpServer())
      .post('/api/v1/leads/generate-async')
      .send(body);

    return response.body.data.jobId;
  }

  async function waitForStatus(jobId: string, status: JobStatus) {
    for (let i = 0; i < 50; i++) {
      const response = await request(app.getHttpServer()).get(
        `/api/v1/leads/status/${jobId}`,
      );

      if (response.body.data.status === status) {
        return response.body.data;
      }

      await setImmediate();
    }

    throw new Error(`${jobId} never reached ${status}`);
  }

  describe('POST /api/v1/leads/generate', () => {
    it('과부하 실패 두 번 뒤 생성된 회사 목록과 메타데이터를 반환한다', async () => {
      // given
      generator.generate
        .mockRejectedValueOnce(overloaded())
        .mockRejectedValueOnce(overloaded())
        .mockResolvedValueOnce(aPayload('Robo One', 'Robo Two', 'Robo Three'));

      // when
      const response = await request(app.getHttpServer())
        .post('/api/v1/leads/generate')
        .send(body);

      // then
      expect(response.status).toBe(200);
      expect(response.body.statusCode).toBe('OK');
      expect(
        response.body.data.companies.map(
          (company: { company_name: string }) => company.company_name,
        ),
      ).toEqual(['Robo One', 'Robo Two', 'Robo Three']);
      expect(response.body.data.metadata).toMatchObject({
        industry: 'robotics',
        country: 'Germany',
        requestedCount: 3,
        actualCount: 3,
        webScrapingEnabled: false,
        enhancementError: null,
      });
      expect(sleeper.sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
    });

    it('count 가 0 이면 400 을 반환하고 작업을 만들지 않는다', async () => {
      // when
      const response = await request(app.getHttpServer())
        .post('/api/v1/leads/generate-async')
        .send({ ...body, count: 0 });

      // then
      expect(response.status).toBe(400);
      expect(response.body.statusCode).toBe('BAD_REQUEST');
      expect(response.body.message).toBe('count must not be less than 1');
      expect(generator.generate).not.toHaveBeenCalled();

      const jobs = await request(app.getHttpServer()).get('/api/v1/leads/jobs');
      expect(jobs.body.data).toEqual([]);
    });

    it('영구 실패는 재시도 없이 502 를 반환한다', async () => {
      // given
      generator.generate.mockRejectedValue(new Error('invalid request'));

      // when
      const response = await request(app.getHttpServer())
        .post('/api/v1/leads/generate')
        .send(body);

      // then
      expect(response.status).toBe(502);
      expect(response.body.statusCode).toBe('BAD_GATEWAY');
      expect(response.body.message).toBe(
        'Lead generation failed: generate failed permanently on attempt 1: invalid request',
      );
      expect(generator.generate).toHaveBeenCalledTimes(1);
      expect(sleeper.sleep).not.toHaveBeenCalled();
    });

    it('웹 스크래핑 보강이 실패해도 생성된 목록과 실패 메시지를 반환한다', async () => {
      // given
      generator.generate.mockResolvedValue(aPayload('Robo One'));
      enhancer.enhance.mockRejectedValue(new Error('scraper offline'));

      // when
      const response = await request(app.getHttpServer())
        .post('/api/v1/leads/generate')
        .send({ ...body, count: 1, enableWebScraping: true });

      // then
      expect(response.status).toBe(200);
      expect(response.body.data.companies).toHaveLength(1);
      expect(response.body.data.metadata.webScrapingEnabled).toBeTrue();
      expect(response.body.data.metadata.enhancementError).toBe(
        'scraper offline',
      );
    });
  });

  describe('POST /api/v1/leads/generate-async', () => {
    it('작업 id 와 상태 조회 경로를 202 로 반환한다', async () => {
      // given
      generator.generate.mockResolvedValue(aPayload('Robo One'));

      // when
      const response = await request(app.getHttpServer())
        .post('/api/v1/leads/generate-async')
        .send(body);

      // then
      const { jobId } = response.body.data;
      expect(response.status).toBe(202);
      expect(jobId).toMatch(/^job_/);
      expect(response.body.data).toEqual({
        jobId,
        status: 'queued',
        statusEndpoint: `/api/v1/leads/status/${jobId}`,
      });
    });

    it('API 키가 설정되지 않았으면 503 을 반환하고 작업을 만들지 않는다', async () => {
      // given
      generator.assertConfigured.mockImplementation(() => {
        throw new GeneratorNotConfiguredError();
      });

      // when
      const response = await request(app.getHttpServer())
        .post('/api/v1/leads/generate-async')
        .send(body);

      // then
      expect(response.status).toBe(503);
      expect(response.body).toEqual({
        statusCode: 'SERVICE_UNAVAILABLE',
        message: 'GEMINI_API_KEY is not configured',
        data: '',
      });

      const jobs = await request(app.getHttpServer()).get('/api/v1/leads/jobs');
      expect(jobs.body.data).toEqual([]);
    });

    it('완료된 작업의 상태는 결과를 포함한다', async () => {
      // given
      const payload = aPayload('Robo One', 'Robo Two');
      generator.generate.mockResolvedValue(payload);

      // when
      const jobId = await submit();
      const view = await waitForStatus(jobId, JobStatus.COMPLETED);

      // then
      expect(view.result).toEqual(payload);
      expect(view.enhancementError).toBeNull();
      expect(Date.parse(view.createdAt)).toBeLessThanOrEqual(
        Date.parse(view.startedAt),
      );
      expect(Date.parse(view.startedAt)).toBeLessThanOrEqual(
        Date.parse(view.completedAt),
      );
    });
  });

  describe('GET /api/v1/leads/status/:jobId', () => {
    it('없는 작업은 404 를 반환한다', async () => {
      // when
      const response = await request(app.getHttpServer()).get(
        '/api/v1/leads/status/job_unknown',
      );

      // then
      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        statusCode: 'NOT_FOUND',
        message: 'Job not found',
        data: '',
      });
    });
  });

  describe('GET /api/v1/leads/export/:jobId', () => {
    it('완료된 작업을 JSON 으로 내보낸다', async () => {
      // given
      generator.generate.mockResolvedValue(aPayload('Robo One', 'Robo Two'));
      const jobId = await submit();
      const view = await waitForStatus(jobId, JobStatus.COMPLETED);

      // when
      const response = await request(app.getHttpServer()).get(
        `/api/v1/leads/export/${jobId}`,
      );

      // then
      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        jobId,
        industry: 'robotics',
        country: 'Germany',
        count: 2,
        generatedAt: view.completedAt,
      });
    });

    it('완료된 작업을 CSV 첨부 파일로 내보낸다', async () => {
      // given
      generator.generate.mockResolvedValue({
        companies: [aCompany('Robo One', { notable_customers: ['BMW', 'Siemens'] })],
      });
      const jobId = await submit();
      await waitForStatus(jobId, JobStatus.COMPLETED);

      // when
      const response = await request(app.getHttpServer()).get(
        `/api/v1/leads/export/${jobId}?format=csv`,
      );

      // then
      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.headers['content-disposition']).toBe(
        `attachment; filename="leads_${jobId}.csv"`,
      );
      expect(response.text.split('\r\n')[1]).toBe(
        'Robo One,https://robo-one.example.com,51-200,"Munich, Germany",,Industrial robots,Manufacturing,,BMW; Siemens,,,,,,,,,',
      );
    });

    it('지원하지 않는 형식은 400 을 반환한다', async () => {
      // when
      const response = await request(app.getHttpServer()).get(
        '/api/v1/leads/export/job_unknown?format=xml',
      );

      // then
      expect(response.status).toBe(400);
    });

    it('끝나지 않은 작업은 내보낼 수 없다', async () => {
      // given
      blockGeneratorUntilAbort();
      const jobId = await submit();

      // when
      const response = await request(app.getHttpServer()).get(
        `/api/v1/leads/export/${jobId}`,
      );

      // then
      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Job not completed yet');
    });
  });

  describe('POST /api/v1/leads/cancel/:jobId', () => {
    it('실행 중인 작업을 취소하면 실패 상태가 된다', async () => {
      // given
      blockGeneratorUntilAbort();
      const jobId = await submit();
      await waitForStatus(jobId, JobStatus.PROCESSING);

      // when
      const response = await request(app.getHttpServer()).post(
        `/api/v1/leads/cancel/${jobId}`,
      );

      // then
      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        jobId,
        status: 'failed',
        error: 'Job cancelled',
      });
    });

    it('이미 끝난 작업은 409 를 반환한다', async () => {
      // given
      generator.generate.mockResolvedValue(aPayload('Robo One'));
      const jobId = await submit();
      await waitForStatus(jobId, JobStatus.COMPLETED);

      // when
      const response = await request(app.getHttpServer()).post(
        `/api/v1/leads/cancel/${jobId}`,
      );

      // then
      expect(response.status).toBe(409);
      expect(response.body.message).toBe('Job already finished');
    });
  });

  describe('GET /api/v1/leads/jobs', () => {
    it('모든 작업을 생성 순서대로 반환한다', async () => {
      // given
      generator.generate.mockResolvedValue(aPayload('Robo One'));
      const first = await submit();
      const second = await submit();
      await waitForStatus(second, JobStatus.COMPLETED);

      // when
      const response = await request(app.getHttpServer()).get(
        '/api/v1/leads/jobs',
      );

      // then
      expect(
        response.body.data.map((job: { jobId: string }) => job.jobId),
      ).toEqual([first, second]);
    });
  });
});
