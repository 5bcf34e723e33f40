import { Request } from 'express';

/**
 * Typed reads over a request body that validators have already checked.
 * A field of the wrong type reads as absent and is rejected downstream.
 */
export class RequestBody {
  private readonly fields: Record<string, unknown>;

  constructor(source: unknown) {
    this.fields = typeof source === 'object' && source !== null && !Array.isArray(source)
      ? Object.fromEntries(Object.entries(source))
      : {};
  }

  static of(req: Request): RequestBody {
    return new RequestBody(req.body);
  }

  raw(name: string): unknown {
    return this.fields[name];
  }

  string(name: string): string | undefined {
    const value = this.fields[name];
    return typeof value === 'string' ? value : undefined;
  }

  requiredString(name: string): string {
    return this.string(name) ?? '';
  }

  number(name: string): number | undefined {
    const value = this.fields[name];
    return typeof value === 'number' ? value : undefined;
  }

  amount(name = 'amount'): number {
    return this.number(name) ?? Number.NaN;
  }
}
