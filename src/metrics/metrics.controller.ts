import { Controller, Get, HttpStatus, ServiceUnavailableException } from '@nestjs/common';
import { MetricsService } from './metrics.service';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  /**
   * GET /metrics
   * Returns: { total_predictions, persistence_failures: { log, store } }
   * 503 when the store cannot be queried.
   */
  @Get()
  async summary() {
    const count = await this.metrics.count();
    if (count.status === 'unavailable') {
      throw new ServiceUnavailableException({
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'StoreUnavailable',
        message: 'Prediction store is unavailable',
        total_predictions: null,
      });
    }

    return {
      total_predictions: count.totalPredictions,
      persistence_failures: this.metrics.persistenceFailures(),
    };
  }
}
