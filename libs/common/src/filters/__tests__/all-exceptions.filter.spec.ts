import {
  ArgumentsHost,
  BadGatewayException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { AllExceptionsFilter } from '../all-exceptions.filter';

interface MockRequest {
  method: string;
  url: string;
}

interface MockResponse {
  headersSent: boolean;
  status: jest.Mock;
  json: jest.Mock;
  setHeader: jest.Mock;
  destroy: jest.Mock;
}

interface MockHttpContext {
  getResponse: () => MockResponse;
  getRequest: () => MockRequest;
}

describe('AllExceptionsFilter', () => {
  let filter: AllExceptionsFilter;
  let mockResponse: MockResponse;
  let mockRequest: MockRequest;
  let mockHost: ArgumentsHost;

  beforeEach(() => {
    filter = new AllExceptionsFilter();

    mockResponse = {
      headersSent: false,
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
      setHeader: jest.fn(),
      destroy: jest.fn(),
    };

    mockRequest = { method: 'GET', url: '/api/v1/stats/summary' };

    mockHost = {
      switchToHttp: (): MockHttpContext => ({
        getResponse: (): MockResponse => mockResponse,
        getRequest: (): MockRequest => mockRequest,
      }),
    } as ArgumentsHost;
  });

  it('should render HTTP exceptions with their status and message', () => {
    filter.catch(new BadGatewayException('Service stats is unavailable'), mockHost);

    expect(mockResponse.status).toHaveBeenCalledWith(502);
    expect(mockResponse.json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 502,
        error: 'Bad Gateway',
        message: 'Service stats is unavailable',
        path: '/api/v1/stats/summary',
        method: 'GET',
      }),
    );
    expect(mockResponse.setHeader).not.toHaveBeenCalled();
  });

  it('should add a Bearer challenge to unauthorized responses', () => {
    filter.catch(new UnauthorizedException('Authorization header required'), mockHost);

    expect(mockResponse.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Bearer');
    expect(mockResponse.status).toHaveBeenCalledWith(401);
    expect(mockResponse.json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'Authorization header required',
      }),
    );
  });

  it('should keep the status of client errors raised by express middleware', () => {
    const tooLarge = Object.assign(new Error('request entity too large'), {
      statusCode: 413,
    });

    filter.catch(tooLarge, mockHost);

    expect(mockResponse.status).toHaveBeenCalledWith(413);
    expect(mockResponse.json).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 413, message: 'request entity too large' }),
    );
  });

  it('should hide the details of unexpected errors', () => {
    filter.catch(new Error('database password is wrong'), mockHost);

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(mockResponse.json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 500,
        error: 'Internal Server Error',
        message: 'An unexpected error occurred',
      }),
    );
  });

  it('should cut off a response that has already started streaming', () => {
    mockResponse.headersSent = true;

    filter.catch(new NotFoundException(), mockHost);

    expect(mockResponse.destroy).toHaveBeenCalled();
    expect(mockResponse.status).not.toHaveBeenCalled();
  });
});
