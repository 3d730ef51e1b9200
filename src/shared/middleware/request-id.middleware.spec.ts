import { IncomingHttpHeaders } from 'http';
import { RequestIdMiddleware, ensureRequestId } from './request-id.middleware';

describe('ensureRequestId', () => {
  it('keeps the id the caller sent', () => {
    const req = { headers: { 'x-request-id': 'caller-id' } };

    expect(ensureRequestId(req)).toBe('caller-id');
  });

  it('assigns one id per request and reuses it', () => {
    const req: { headers: IncomingHttpHeaders } = { headers: {} };

    const first = ensureRequestId(req);

    expect(first).toMatch(/^req-[0-9a-f-]{36}$/);
    expect(req.headers['x-request-id']).toBe(first);
    expect(ensureRequestId(req)).toBe(first);
  });
});

describe('RequestIdMiddleware', () => {
  const middleware = new RequestIdMiddleware();

  it('echoes the id already assigned to the request', () => {
    const req: { headers: IncomingHttpHeaders } = { headers: {} };
    const assigned = ensureRequestId(req);
    const setHeader = jest.fn();
    const next = jest.fn();

    middleware.use(req, { setHeader }, next);

    expect(setHeader).toHaveBeenCalledWith('X-Request-ID', assigned);
    expect(req.headers['x-request-id']).toBe(assigned);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('assigns an id when none was set', () => {
    const req: { headers: IncomingHttpHeaders } = { headers: {} };
    const setHeader = jest.fn();

    middleware.use(req, { setHeader }, jest.fn());

    expect(setHeader).toHaveBeenCalledWith('X-Request-ID', req.headers['x-request-id']);
    expect(req.headers['x-request-id']).toMatch(/^req-/);
  });
});
