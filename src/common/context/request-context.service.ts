import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';

interface RequestContextState {
  correlationId: string;
}

/** Carries the request's correlation id across async boundaries. */
@Injectable()
export class RequestContextService {
  private readonly storage = new AsyncLocalStorage<RequestContextState>();

  run<T>(correlationId: string, callback: () => T): T {
    return this.storage.run({ correlationId }, callback);
  }

  correlationId(): string | undefined {
    return this.storage.getStore()?.correlationId;
  }
}
