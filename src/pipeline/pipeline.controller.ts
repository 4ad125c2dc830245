import { Controller, Post, Body, Inject, HttpCode } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiBody, ApiSecurity } from '@nestjs/swagger';
import { PipelineService, type PipelineResult } from './pipeline.service.js';
import { RunPipelineDto } from './dto/run-pipeline.dto.js';
import { toHttpException } from '../common/http-errors.js';

@ApiTags('pipeline')
@ApiSecurity('X-API-Key')
@Controller('pipeline')
export class PipelineController {
  constructor(@Inject(PipelineService) private readonly pipeline: PipelineService) {}

  @Post('run')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Fetch, normalize and load the commit window, then run all analyses',
  })
  @ApiBody({ type: RunPipelineDto, required: false })
  async run(@Body() body: RunPipelineDto = {}): Promise<PipelineResult> {
    const scope = this.pipeline.resolveScope({ repo: body.repo, monthsBack: body.monthsBack });
    try {
      return await this.pipeline.run(scope);
    } catch (error: unknown) {
      throw toHttpException(error);
    }
  }
}
