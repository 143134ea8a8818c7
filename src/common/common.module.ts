import { Global, Module } from '@nestjs/common';
import { RequestContextService } from './context/request-context.service';
import { AllExceptionsFilter } from './filters/all-exceptions.filter';
import { ApiKeyGuard } from './guards/api-key.guard';
import { CorrelationIdMiddleware } from './middleware/correlation-id.middleware';

@Global()
@Module({
  providers: [RequestContextService, AllExceptionsFilter, ApiKeyGuard, CorrelationIdMiddleware],
  exports: [RequestContextService, AllExceptionsFilter, ApiKeyGuard, CorrelationIdMiddleware],
})
export class CommonModule {}
