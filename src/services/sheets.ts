import { z } from 'zod';
import { Sheet } from '../lister/schema.js';
import {
  AuthorizationFailure,
  NotFoundFailure,
  TransportFailure,
  type SheetFetchError,
} from '../lister/errors.js';

/** The one capability the lister needs from a spreadsheet service. */
export interface SheetReader {
  fetchSheet(sheetId: string): Promise<Sheet>;
}

/** The slice of the Smartsheet client the reader calls. */
export interface SheetsClient {
  sheets: {
    getSheet(options: { id: number }): Promise<unknown>;
  };
}

// 1001-1004: token missing, invalid or expired, or caller not authorized.
const AUTHORIZATION_ERROR_CODES = new Set([1001, 1002, 1003, 1004]);
const NOT_FOUND_ERROR_CODE = 1006;

const optionalNumber = z.number().optional().catch(undefined);
const optionalString = z.string().optional().catch(undefined);

// API errors carry statusCode/errorCode/message. Socket errors arrive as
// { code, errno, syscall, address, port } with no message.
const ApiErrorShape = z.object({
  statusCode: optionalNumber,
  errorCode: optionalNumber,
  message: optionalString,
  code: optionalString,
  syscall: optionalString,
  address: optionalString,
  port: optionalNumber,
  response: z
    .object({ status: optionalNumber })
    .optional()
    .catch(undefined),
});

type ApiErrorShape = z.infer<typeof ApiErrorShape>;

function describeReason(fields: ApiErrorShape, error: unknown): string {
  if (fields.message) {
    return fields.message;
  }
  if (fields.code) {
    const target =
      fields.address && fields.port !== undefined
        ? `${fields.address}:${fields.port}`
        : fields.address;
    const location = [fields.syscall, target].filter(Boolean).join(' ');
    return location ? `${fields.code} (${location})` : fields.code;
  }
  if (typeof error === 'string' && error) {
    return error;
  }
  return 'no error detail returned by the Smartsheet client';
}

/**
 * Map a rejected SDK call onto one of the three failure kinds.
 */
export function classifyFetchError(sheetId: string, error: unknown): SheetFetchError {
  const parsed = ApiErrorShape.safeParse(error);
  const fields: ApiErrorShape = parsed.success ? parsed.data : {};
  const statusCode = fields.statusCode ?? fields.response?.status;
  const { errorCode } = fields;
  const details = { sheetId, statusCode, errorCode, cause: error };
  const reason = describeReason(fields, error);

  if (
    statusCode === 401 ||
    statusCode === 403 ||
    (errorCode !== undefined && AUTHORIZATION_ERROR_CODES.has(errorCode))
  ) {
    return new AuthorizationFailure(`Not authorized to read sheet ${sheetId}: ${reason}`, details);
  }

  if (statusCode === 404 || errorCode === NOT_FOUND_ERROR_CODE) {
    return new NotFoundFailure(
      `Sheet ${sheetId} was not found or is not shared with this token`,
      details
    );
  }

  return new TransportFailure(`Could not fetch sheet ${sheetId}: ${reason}`, details);
}

/**
 * SheetReader backed by the Smartsheet SDK. One request per call, no retries
 * of our own; the response is validated before it is handed back.
 */
export function createSmartsheetReader(client: SheetsClient): SheetReader {
  return {
    async fetchSheet(sheetId: string): Promise<Sheet> {
      let response: unknown;
      try {
        response = await client.sheets.getSheet({ id: Number(sheetId) });
      } catch (error) {
        throw classifyFetchError(sheetId, error);
      }

      const result = Sheet.safeParse(response);
      if (!result.success) {
        const issues = result.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw new TransportFailure(`Malformed response for sheet ${sheetId}: ${issues}`, {
          sheetId,
          cause: result.error,
        });
      }

      return result.data;
    },
  };
}
