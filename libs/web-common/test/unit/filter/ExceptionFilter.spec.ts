import {
  ArgumentsHost,
  BadRequestException,
  HttpStatus,
} from '@nestjs/common';
import { HttpArgumentsHost } from '@nestjs/common/interfaces';
import { Request, Response } from 'express';
import { mock, MockProxy } from 'jest-mock-extended';
import { Logger } from '@app/logger/Logger';
import { DomainExceptionFilter } from '../../../src/filter/DomainExceptionFilter';
import { GlobalExceptionFilter } from '../../../src/filter/GlobalExceptionFilter';
import { DomainException } from '../../../src/res/exception/DomainException';

describe('ExceptionFilter', () => {
  let logger: MockProxy<Logger>;
  let response: MockProxy<Response>;
  let host: ArgumentsHost;

  beforeEach(() => {
    logger = mock<Logger>();
    response = mock<Response>();
    response.status.mockReturnThis();

    const request = mock<Request>({
      url: '/api/v1/leads/status/job_1',
      body: {},
      query: {},
    });
    const http = mock<HttpArgumentsHost>({
      getRequest: jest.fn().mockReturnValue(request),
      getResponse: jest.fn().mockReturnValue(response),
    });
    host = mock<ArgumentsHost>({ switchToHttp: () => http });
  });

  describe('DomainExceptionFilter', () => {
    it('예외의 상태와 응답 메시지로 응답한다.', () => {
      // given
      const exception = new DomainException(HttpStatus.NOT_FOUND, {
        message: 'Job job_1 not found',
        responseMessage: 'Job not found',
        parameter: { jobId: 'job_1' },
      });

      // when
      new DomainExceptionFilter(logger).catch(exception, host);

      // then
      expect(response.status).toHaveBeenCalledWith(404);
      expect(response.json).toHaveBeenCalledWith({
        statusCode: 'NOT_FOUND',
        message: 'Job not found',
        data: '',
      });
      expect(logger.info).toHaveBeenCalledWith(
        'DomainException: message = Job job_1 not found path=/api/v1/leads/status/job_1 parameter = {"jobId":"job_1"}',
        exception,
      );
    });
  });

  describe('GlobalExceptionFilter', () => {
    it('HttpException 은 검증 메시지를 이어 붙여 응답한다.', () => {
      // given
      const exception = new BadRequestException([
        'count must not be less than 1',
        'country should not be empty',
      ]);

      // when
      new GlobalExceptionFilter(logger).catch(exception, host);

      // then
      expect(response.status).toHaveBeenCalledWith(400);
      expect(response.json).toHaveBeenCalledWith({
        statusCode: 'BAD_REQUEST',
        message: 'count must not be less than 1, country should not be empty',
        data: '',
      });
    });

    it('알 수 없는 예외는 500 으로 응답하고 error 로 남긴다.', () => {
      // given
      const exception = new Error('boom');

      // when
      new GlobalExceptionFilter(logger).catch(exception, host);

      // then
      expect(response.status).toHaveBeenCalledWith(500);
      expect(response.json).toHaveBeenCalledWith({
        statusCode: 'SERVER_ERROR',
        message: 'Internal server error',
        data: '',
      });
      expect(logger.error).toHaveBeenCalledWith(
        'GlobalException: path = /api/v1/leads/status/job_1',
        exception,
      );
    });
  });
});
