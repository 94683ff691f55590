import { Module, Global } from '@nestjs/common';
import { ApiClientService } from './api-client.service';
import { FETCH, FetchFn } from './http.constants';

function globalFetch(): FetchFn {
  if (typeof fetch === 'function') {
    return fetch.bind(globalThis);
  }
  throw new Error('fetch is not available in the current environment');
}

@Global()
@Module({
  providers: [
    {
      provide: FETCH,
      useFactory: globalFetch,
    },
    ApiClientService,
  ],
  exports: [ApiClientService],
})
export class HttpModule {}
