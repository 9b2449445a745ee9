import { BadRequestException, NotFoundException, type ArgumentsHost } from '@nestjs/common';
import { ThrottlerException } from '@nestjs/throttler';
import { HttpExceptionFilter } from '@/common/filters/http-exception.filter';
import { BACKEND_ERROR_MESSAGE } from '@/common/constants/error-messages.constants';
import { ReviewStoreIntegrityError } from '@/modules/reviews/domain/errors';

describe('HttpExceptionFilter', () => {
  function buildHost(): {
    host: ArgumentsHost;
    response: { status: jest.Mock; json: jest.Mock };
  } {
    const response = {
      status: jest.fn(),
      json: jest.fn(),
    };
    response.status.mockReturnValue(response);
    const request = { method: 'POST', path: '/reviews', requestId: 'req-1' };
    const host = {
      switchToHttp: () => ({
        getResponse: () => response,
        getRequest: () => request,
      }),
    } as unknown as ArgumentsHost;

    return { host, response };
  }

  it('keeps the message of client errors', () => {
    const { host, response } = buildHost();

    new HttpExceptionFilter().catch(new BadRequestException('Invalid payload.'), host);

    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith({
      ok: false,
      message: 'Invalid payload.',
      requestId: 'req-1',
    });
  });

  it('uses the framework message for built-in exceptions', () => {
    const { host, response } = buildHost();

    new HttpExceptionFilter().catch(new NotFoundException(), host);

    expect(response.status).toHaveBeenCalledWith(404);
    expect(response.json).toHaveBeenCalledWith({
      ok: false,
      message: 'Not Found',
      requestId: 'req-1',
    });
  });

  it('answers throttled requests with a fixed 429 message', () => {
    const { host, response } = buildHost();

    new HttpExceptionFilter().catch(new ThrottlerException(), host);

    expect(response.status).toHaveBeenCalledWith(429);
    expect(response.json).toHaveBeenCalledWith({
      ok: false,
      message: 'Too many requests.',
      requestId: 'req-1',
    });
  });

  it('hides store errors behind a 500 with a fixed message', () => {
    const { host, response } = buildHost();

    new HttpExceptionFilter().catch(new Error('password authentication failed'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({
      ok: false,
      message: BACKEND_ERROR_MESSAGE,
      requestId: 'req-1',
    });
  });

  it('maps integrity errors to 500', () => {
    const { host, response } = buildHost();

    new HttpExceptionFilter().catch(new ReviewStoreIntegrityError('Review 1 not found'), host);

    expect(response.status).toHaveBeenCalledWith(500);
  });
});
