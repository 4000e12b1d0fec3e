import { Response } from 'express';
import { sendSuccess, sendError, sendPaginated } from '../../src/utils/response';
import { paginationQuery } from '../../src/schemas';

const mockResponse = (): Response => {
  const res: Partial<Response> = {};
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  return res as Response;
};

const bodyOf = (res: Response): unknown => jest.mocked(res.json).mock.calls[0][0];

describe('Response envelopes', () => {
  it('should wrap an imported batch with its status code and message', () => {
    const res = mockResponse();
    const data = {
      transactions: [{ id: 7, amount: '1250.00', currency: 'USD' }],
      replayed: false,
    };

    sendSuccess(res, data, 'Transactions imported', 201);

    expect(res.status).toHaveBeenCalledWith(201);
    expect(bodyOf(res)).toEqual({
      success: true,
      data,
      message: 'Transactions imported',
      timestamp: expect.any(String),
    });
  });

  it('should default to 200 without a message', () => {
    const res = mockResponse();

    sendSuccess(res, { score: '65.00' });

    expect(res.status).toHaveBeenCalledWith(200);
    expect(bodyOf(res)).toMatchObject({ success: true, data: { score: '65.00' }, message: undefined });
  });

  it('should carry an error code', () => {
    const res = mockResponse();

    sendError(res, 'Service is not ready: database', 503, undefined, 'SERVICE_UNAVAILABLE');

    expect(res.status).toHaveBeenCalledWith(503);
    expect(bodyOf(res)).toEqual({
      success: false,
      error: 'Service is not ready: database',
      code: 'SERVICE_UNAVAILABLE',
      message: undefined,
      timestamp: expect.any(String),
    });
  });

  describe('sendPaginated', () => {
    it('should echo the parsed page request', () => {
      const res = mockResponse();
      const pageRequest = paginationQuery.parse({ page: '2', limit: '5' });

      sendPaginated(res, [{ id: 6, amount: '10.00' }], pageRequest, 23);

      expect(bodyOf(res)).toMatchObject({
        data: [{ id: 6, amount: '10.00' }],
        pagination: { page: 2, limit: 5, total: 23, totalPages: 5 },
      });
    });

    it('should apply the default page size', () => {
      const res = mockResponse();

      sendPaginated(res, [], paginationQuery.parse({}), 41);

      expect(bodyOf(res)).toMatchObject({
        pagination: { page: 1, limit: 20, total: 41, totalPages: 3 },
      });
    });

    it('should report zero pages for an empty listing', () => {
      const res = mockResponse();

      sendPaginated(res, [], { page: 1, limit: 20 }, 0, 'No invoices');

      expect(res.status).toHaveBeenCalledWith(200);
      expect(bodyOf(res)).toMatchObject({
        message: 'No invoices',
        pagination: { page: 1, limit: 20, total: 0, totalPages: 0 },
      });
    });
  });
});
