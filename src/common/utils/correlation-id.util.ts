import { IncomingHttpHeaders } from 'http';
import { v4 as uuidv4 } from 'uuid';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

export class CorrelationIdUtil {
  static generate(): string {
    return uuidv4();
  }

  static extract(headers: IncomingHttpHeaders): string | undefined {
    const value = headers[CORRELATION_ID_HEADER] ?? headers['correlation-id'];
    const id = Array.isArray(value) ? value[0] : value;
    return id && id.trim().length > 0 ? id : undefined;
  }

  static getOrGenerate(headers: IncomingHttpHeaders): string {
    return this.extract(headers) || this.generate();
  }
}
