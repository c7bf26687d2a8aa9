import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { predictionRequestSchema } from '@depin-compat/shared';
import type { PredictionRequest } from '@depin-compat/shared';
import { parseWithSchema } from '../../common/validation';
import { predictionDuration, predictionRequests } from '../metrics/metrics.registry';
import { CompatibilityService } from './compatibility.service';

@ApiTags('compatibility')
@Controller('predict')
export class CompatibilityController {
  constructor(private readonly compatibilityService: CompatibilityService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  predict(@Body() body: unknown) {
    let request: PredictionRequest;
    try {
      request = parseWithSchema(predictionRequestSchema, body ?? {}, 'Invalid system specifications');
    } catch (error) {
      predictionRequests.inc({ outcome: 'rejected' });
      throw error;
    }

    const stopTimer = predictionDuration.startTimer();
    const response = this.compatibilityService.predict(request.system);
    stopTimer();
    predictionRequests.inc({ outcome: 'scored' });

    return response;
  }
}
