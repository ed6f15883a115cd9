import {
  ArgumentsHost,
  HttpException,
  HttpStatus,
  BadRequestException,
  NotFoundException,
  ConflictException,
  UnauthorizedException,
  ForbiddenException,
} from '@nestjs/common';
import { HttpExceptionFilter } from '@common/filters/http-exception.filter';
import {
  BookingExpiredException,
  SeatUnavailableException,
} from '@common/exceptions/seat-inventory.exceptions';
import { Request, Response } from 'express';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let mockResponse: { status: jest.Mock; json: jest.Mock };
  let mockRequest: { url: string; method: string; headers: Record<string, string> };
  let mockHost: ArgumentsHost;

  beforeEach(() => {
    filter = new HttpExceptionFilter();

    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };

    mockRequest = {
      url: '/test',
      method: 'GET',
      headers: {
        'x-correlation-id': 'test-correlation-id',
      },
    };

    mockHost = {
      switchToHttp: () => ({
        getResponse: () => mockResponse as unknown as Response,
        getRequest: () => mockRequest as unknown as Request,
      }),
    } as ArgumentsHost;
  });

  describe('catch', () => {
    it('should handle HttpException with correct status', () => {
      const exception = new HttpException('Test error', HttpStatus.BAD_REQUEST);

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.BAD_REQUEST,
          message: 'Test error',
          path: '/test',
          method: 'GET',
        }),
      );
    });

    it('should handle generic Error as 500 without leaking its message', () => {
      const exception = new Error('relation "seats" does not exist');

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          message: 'Internal server error',
          error: 'Internal Server Error',
        }),
      );
    });

    it('should render seat conflicts with their code and details', () => {
      const exception = new SeatUnavailableException(
        'showing-1',
        ['seat-1', 'seat-2'],
        ['A1', 'A2'],
      );

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.CONFLICT);
      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.CONFLICT,
          error: 'SeatUnavailable',
          message: 'Seats not available: A1, A2',
          details: {
            showingId: 'showing-1',
            seatIds: ['seat-1', 'seat-2'],
            seatLabels: ['A1', 'A2'],
          },
        }),
      );
    });

    it('should render expired bookings with the expiry instant', () => {
      const exception = new BookingExpiredException(
        'booking-1',
        new Date('2026-03-01T10:15:00.000Z'),
      );

      filter.catch(exception, mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          error: 'BookingExpired',
          message: 'Booking booking-1 expired at 2026-03-01T10:15:00.000Z',
          details: { bookingId: 'booking-1', expiredAt: '2026-03-01T10:15:00.000Z' },
        }),
      );
    });

    it('should omit details for plain http exceptions', () => {
      filter.catch(new NotFoundException('Resource not found'), mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          details: undefined,
        }),
      );
    });

    it('should handle unknown exception as 500', () => {
      const exception = 'unknown error';

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          message: 'Internal server error',
        }),
      );
    });

    it('should include correlation id in response', () => {
      const exception = new HttpException('Test', HttpStatus.BAD_REQUEST);

      filter.catch(exception, mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          correlationId: 'test-correlation-id',
        }),
      );
    });

    it('should include timestamp in response', () => {
      const exception = new HttpException('Test', HttpStatus.BAD_REQUEST);

      filter.catch(exception, mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          timestamp: expect.any(String) as string,
        }),
      );
    });

    it('should handle BadRequestException with array message', () => {
      const exception = new BadRequestException({
        message: ['field1 is required', 'field2 must be a string'],
        error: 'Bad Request',
      });

      filter.catch(exception, mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          message: ['field1 is required', 'field2 must be a string'],
        }),
      );
    });

    it('should handle NotFoundException', () => {
      const exception = new NotFoundException('Resource not found');

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.NOT_FOUND);
    });

    it('should handle ConflictException', () => {
      const exception = new ConflictException('Conflict occurred');

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.CONFLICT);
    });

    it('should handle UnauthorizedException', () => {
      const exception = new UnauthorizedException('Unauthorized');

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.UNAUTHORIZED);
    });

    it('should handle ForbiddenException', () => {
      const exception = new ForbiddenException('Forbidden');

      filter.catch(exception, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.FORBIDDEN);
    });

    it('should return correct error name for 400', () => {
      filter.catch(new BadRequestException('Test'), mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          error: 'Bad Request',
        }),
      );
    });

    it('should return correct error name for 404', () => {
      filter.catch(new NotFoundException('Test'), mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          error: 'Not Found',
        }),
      );
    });

    it('should return correct error name for 409', () => {
      filter.catch(new ConflictException('Test'), mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          error: 'Conflict',
        }),
      );
    });

    it('should handle HttpException with custom error name', () => {
      const exception = new HttpException(
        { message: 'Custom error', error: 'Custom Error Name' },
        HttpStatus.BAD_REQUEST,
      );

      filter.catch(exception, mockHost);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          error: 'Custom Error Name',
        }),
      );
    });
  });
});
