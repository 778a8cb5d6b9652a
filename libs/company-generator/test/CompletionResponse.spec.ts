import { CompletionResponse } from '@app/company-generator/dto/CompletionResponse';
import { UnparseableCompletionError } from '@app/company-generator/error/UnparseableCompletionError';
import { FailureClass } from '@app/resilience/classifier/FailureClass';
import { FailureClassifier } from '@app/resilience/classifier/FailureClassifier';

describe('CompletionResponse', () => {
  const json = '{"companies":[{"company_name":"Robo One"}]}';

  describe('answer', () => {
    it.each([
      ['```json 펜스', '```json\n' + json + '\n```'],
      ['언어 없는 펜스', 'Here you go:\n```\n' + json + '\n```\nThanks'],
      ['펜스 없는 응답', `  ${json}\n`],
    ])('%s에서 JSON 본문만 꺼낸다', (_, content) => {
      // when
      const answer = new CompletionResponse(content).answer;

      // then
      expect(answer).toBe(json);
    });
  });

  describe('toPayload', () => {
    it('회사 레코드를 정규화한다', () => {
      // given
      const content = JSON.stringify({
        companies: [
          {
            company_name: ' Robo One ',
            website_url: 'https://robo-one.example.com',
            company_size: '',
            number_of_users: 1200,
            notable_customers: ['BMW', null, ' '],
            decision_maker_roles: [],
            social_media: { linkedin: 'https://linkedin.com/company/robo-one', twitter: null },
            contact_email: 'info@robo-one.example.com',
          },
        ],
      });

      // when
      const payload = new CompletionResponse(content).toPayload();

      // then
      expect(payload.companies).toEqual([
        {
          company_name: 'Robo One',
          website_url: 'https://robo-one.example.com',
          company_size: null,
          headquarters_location: null,
          revenue_market_cap: null,
          key_products_services: null,
          target_market: null,
          number_of_users: '1200',
          notable_customers: ['BMW'],
          social_media: { linkedin: 'https://linkedin.com/company/robo-one' },
          contact_email: 'info@robo-one.example.com',
          recent_news_insights: null,
          decision_maker_roles: null,
        },
      ]);
    });

    it('회사명이 없는 항목은 버린다', () => {
      // given
      const content = JSON.stringify({
        companies: [{ company_name: '' }, 'Robo Two', { company_name: 'Robo Three' }],
      });

      // when
      const payload = new CompletionResponse(content).toPayload();

      // then
      expect(payload.companies.map((c) => c.company_name)).toEqual(['Robo Three']);
    });

    it('companies 배열이 없으면 UnparseableCompletionError를 던진다', () => {
      // given
      const response = new CompletionResponse('{"error":"Failed to parse"}');

      // when
      const action = () => response.toPayload();

      // then
      expect(action).toThrow(
        'Model output could not be parsed: no "companies" array in the answer',
      );
    });

    it('JSON이 아니면 원문을 보관한 UnparseableCompletionError를 던진다', () => {
      // given
      const response = new CompletionResponse('Sorry, I cannot list companies.');

      // when
      const error = captureError(() => response.toPayload());

      // then
      expect(error).toBeInstanceOf(UnparseableCompletionError);
      expect(error).toMatchObject({
        message: 'Model output could not be parsed: answer is not JSON',
        rawContent: 'Sorry, I cannot list companies.',
      });
    });

    it('빈 응답은 UnparseableCompletionError를 던진다', () => {
      // given
      const response = new CompletionResponse(null);

      // when
      const action = () => response.toPayload();

      // then
      expect(action).toThrow('Model output could not be parsed: empty answer');
    });

    it('원문에 일시 장애 단어가 있어도 영구 실패로 분류된다', () => {
      // given
      const response = new CompletionResponse('Network Solutions is overloaded');

      // when
      const error = captureError(() => response.toPayload());

      // then
      expect(FailureClassifier.classify(error)).toBe(FailureClass.PERMANENT);
    });
  });
});

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (e) {
    return e;
  }

  throw new Error('expected an error');
}
