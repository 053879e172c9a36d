import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { JobManagerService } from '@/shared/jobs/services/job-manager.service';
import { ApiKeyGuard } from '../guards/api-key.guard';
import { JobAcceptedDto, JobMapper, JobStatusDto } from '../mappers/job.mapper';

@Controller('jobs')
export class JobsController {
  private readonly logger = new Logger(JobsController.name);

  constructor(
    private readonly jobManager: JobManagerService,
    private readonly jobMapper: JobMapper,
  ) {}

  @Post(':taskName')
  @HttpCode(HttpStatus.ACCEPTED)
  @UseGuards(ApiKeyGuard)
  submit(
    @Param('taskName') taskName: string,
    @Body() params: unknown,
  ): JobAcceptedDto {
    const jobId = this.jobManager.submit(taskName, params ?? {});
    this.logger.log(`Accepted job ${jobId} for ${taskName}`);
    return this.jobMapper.toAccepted(jobId);
  }

  @Get(':jobId')
  getStatus(@Param('jobId') jobId: string): JobStatusDto {
    return this.jobMapper.toStatus(this.jobManager.getStatus(jobId));
  }
}
