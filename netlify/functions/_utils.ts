import { randomUUID } from 'crypto';
import type { HandlerContext, HandlerEvent, HandlerResponse } from '@netlify/functions';

type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'OPTIONS';

type HandlerUtilities = {
  json: (statusCode: number, body: unknown, headers?: Record<string, string>) => HandlerResponse;
  text: (statusCode: number, body: string, headers?: Record<string, string>) => HandlerResponse;
  requestId: string;
};

type HandlerResult = HandlerResponse | Record<string, unknown> | string | void;

type WrappedHandler = (
  event: HandlerEvent,
  context: HandlerContext,
  utils: HandlerUtilities
) => Promise<HandlerResult>;

export type FunctionHandler = (event: HandlerEvent, context: HandlerContext) => Promise<HandlerResponse>;

export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

function createUtilities(requestId: string): HandlerUtilities {
  return {
    json(statusCode, body, headers = {}) {
      return {
        statusCode,
        headers: { 'Content-Type': 'application/json', 'x-request-id': requestId, ...headers },
        body: JSON.stringify(body ?? {}),
      };
    },
    text(statusCode, body, headers = {}) {
      return {
        statusCode,
        headers: { 'Content-Type': 'text/plain', 'x-request-id': requestId, ...headers },
        body,
      };
    },
    requestId,
  };
}

function buildErrorResponse(err: unknown, utils: HandlerUtilities): HandlerResponse {
  const statusCode = err instanceof HttpError && Number.isInteger(err.statusCode) ? err.statusCode : 500;
  const message = err instanceof Error && err.message ? err.message : 'Internal Server Error';
  return utils.json(statusCode, { ok: false, error: message, requestId: utils.requestId });
}

function isHandlerResponse(result: HandlerResult): result is HandlerResponse {
  return typeof result === 'object' && result !== null && typeof result.statusCode === 'number';
}

function normaliseResult(result: HandlerResult, utils: HandlerUtilities): HandlerResponse {
  if (isHandlerResponse(result)) {
    return result;
  }

  if (typeof result === 'string') {
    return utils.text(200, result);
  }

  return utils.json(200, result ?? {});
}

export function createHandler(methods: HttpMethod[], handler: WrappedHandler): FunctionHandler {
  const allowed = methods.map((method) => method.toUpperCase());

  return async (event, context) => {
    const requestId =
      event.headers?.['x-request-id'] ||
      event.headers?.['X-Request-Id'] ||
      context.awsRequestId ||
      randomUUID();
    const utils = createUtilities(requestId);

    if (event.httpMethod && !allowed.includes(event.httpMethod.toUpperCase())) {
      return utils.json(
        405,
        {
          ok: false,
          error: `Method ${event.httpMethod} not allowed`,
          requestId,
        },
        { Allow: allowed.join(', ') }
      );
    }

    try {
      const result = await handler(event, context, utils);
      return normaliseResult(result, utils);
    } catch (err) {
      return buildErrorResponse(err, utils);
    }
  };
}

export function parseJsonBody(event: HandlerEvent): unknown {
  if (!event.body) {
    return {};
  }

  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;

  if (!raw.trim()) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, 'Invalid JSON body');
  }
}

export type { HandlerUtilities };
