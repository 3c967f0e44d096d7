import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { DeleteJobPort } from '../../application/ports/input/delete-job.port';
import type { GetJobPort } from '../../application/ports/input/get-job.port';
import type { ListJobsPort } from '../../application/ports/input/list-jobs.port';
import type { SubmitConversionPort } from '../../application/ports/input/submit-conversion.port';
import {
  DeleteJobUseCase,
  GetJobUseCase,
  ListJobsUseCase,
  SubmitConversionUseCase,
} from '../../application/use-cases';
import type { AppConfig } from '../../config/configuration';
import type {
  ConversionJobView,
  PageImageView,
} from '../../domain/entities/conversion-job.entity';
import type { JobErrorDetail } from '../../domain/errors/conversion.errors';
import { parseConvertQuery, toConversionOptions } from '../dto/convert-query.dto';
import { readUpload } from '../upload/multipart-upload';

export interface JobAcceptedResponse {
  jobId: string;
  status: string;
  statusUrl: string;
}

export interface JobListResponse {
  total: number;
  jobs: ConversionJobView[];
}

export interface JobResultResponse {
  jobId: string;
  status: string;
  pageCount: number;
  images: PageImageView[];
  error: JobErrorDetail | null;
}

/**
 * Conversion Controller
 * Job submission and job inspection endpoints
 */
@Controller()
export class ConversionController {
  private readonly baseUrl: string;

  constructor(
    @Inject(SubmitConversionUseCase) private readonly submitConversion: SubmitConversionPort,
    @Inject(GetJobUseCase) private readonly getJob: GetJobPort,
    @Inject(ListJobsUseCase) private readonly listJobs: ListJobsPort,
    @Inject(DeleteJobUseCase) private readonly deleteJob: DeleteJobPort,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
  ) {
    this.baseUrl = configService.get('server.baseUrl', { infer: true });
  }

  /**
   * Accepts a presentation and queues it with 202. With `wait=true` the
   * response is held until the job is terminal and carries the full job
   * view with 200.
   */
  @Post('convert')
  async convert(
    @Req() req: FastifyRequest,
    @Query() query: Record<string, unknown>,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const parsed = parseConvertQuery(query);
    const upload = await readUpload(req);

    const { job, completion } = await this.submitConversion.execute({
      filename: upload.filename,
      content: upload.content,
      options: toConversionOptions(parsed),
    });

    if (parsed.wait) {
      const finished = await completion;
      reply.status(HttpStatus.OK).send(finished.toView(this.baseUrl));
      return;
    }

    const accepted: JobAcceptedResponse = {
      jobId: job.jobId,
      status: job.status.toString(),
      statusUrl: `${this.baseUrl}/jobs/${encodeURIComponent(job.jobId)}`,
    };
    reply.status(HttpStatus.ACCEPTED).send(accepted);
  }

  @Get('jobs')
  async list(): Promise<JobListResponse> {
    const jobs = await this.listJobs.execute();
    return {
      total: jobs.length,
      jobs: jobs.map((job) => job.toView(this.baseUrl)),
    };
  }

  @Get('jobs/:jobId')
  async status(@Param('jobId') jobId: string): Promise<ConversionJobView> {
    const job = await this.getJob.execute(jobId);
    return job.toView(this.baseUrl);
  }

  @Get('jobs/:jobId/result')
  async result(@Param('jobId') jobId: string): Promise<JobResultResponse> {
    const { job } = await this.getJob.getResult(jobId);
    const view = job.toView(this.baseUrl);

    return {
      jobId: view.jobId,
      status: view.status,
      pageCount: view.pageCount,
      images: view.images,
      error: view.error,
    };
  }

  @Delete('jobs/:jobId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('jobId') jobId: string): Promise<void> {
    await this.deleteJob.execute(jobId);
  }
}
