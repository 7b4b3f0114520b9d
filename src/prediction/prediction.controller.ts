// src/prediction/prediction.controller.ts
import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { PredictionService } from './prediction.service';
import { PredictRequestDto, PredictResponseDto } from './dto/predict.dto';

@Controller()
export class PredictionController {
  constructor(private readonly predictions: PredictionService) {}

  /**
   * POST /predict
   * Body: { total_rooms, total_bedrooms, population, households,
   *         median_income, housing_median_age, latitude, longitude }
   * Returns: { predicted_price: number }
   */
  @Post('predict')
  @HttpCode(200)
  predict(@Body() body: PredictRequestDto): Promise<PredictResponseDto> {
    return this.predictions.handle(body);
  }
}
