import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseEnumPipe,
  Post,
  Query,
  StreamableFile,
  Version,
} from '@nestjs/common';
import { LeadJobOrchestrator } from '@app/lead-job/LeadJobOrchestrator';
import { LeadGenerationRequest } from '@app/lead-job/model/LeadGenerationRequest';
import {
  JobStatusView,
  LeadExport,
} from '@app/lead-job/projector/LeadResultProjector';
import { ResponseEntity } from '@app/web-common/res/ResponseEntity';
import { ExportFormat } from './dto/ExportFormat';
import { LeadGenerateResponse } from './dto/LeadGenerateResponse';
import { LeadJobAccepted } from './dto/LeadJobAccepted';

@Controller('leads')
export class LeadController {
  constructor(private readonly orchestrator: LeadJobOrchestrator) {}

  @Post('generate')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async generate(
    @Body() request: LeadGenerationRequest,
  ): Promise<ResponseEntity<LeadGenerateResponse>> {
    const outcome = await this.orchestrator.runSync(request);

    return ResponseEntity.OK_WITH(
      LeadGenerateResponse.of(request, outcome, new Date()),
    );
  }

  @Post('generate-async')
  @Version('1')
  @HttpCode(HttpStatus.ACCEPTED)
  async generateAsync(
    @Body() request: LeadGenerationRequest,
  ): Promise<ResponseEntity<LeadJobAccepted>> {
    const { jobId } = await this.orchestrator.submit(request);

    return ResponseEntity.OK_WITH(
      new LeadJobAccepted(jobId),
      'Lead generation started',
    );
  }

  @Get('status/:jobId')
  @Version('1')
  async status(
    @Param('jobId') jobId: string,
  ): Promise<ResponseEntity<JobStatusView>> {
    return ResponseEntity.OK_WITH(await this.orchestrator.getStatus(jobId));
  }

  @Get('export/:jobId')
  @Version('1')
  async export(
    @Param('jobId') jobId: string,
    @Query(
      'format',
      new DefaultValuePipe(ExportFormat.JSON),
      new ParseEnumPipe(ExportFormat),
    )
    format: ExportFormat,
  ): Promise<ResponseEntity<LeadExport> | StreamableFile> {
    if (format === ExportFormat.JSON) {
      return ResponseEntity.OK_WITH(await this.orchestrator.export(jobId));
    }

    const csv = await this.orchestrator.exportCsv(jobId);

    return new StreamableFile(Buffer.from(csv, 'utf8'), {
      type: 'text/csv; charset=utf-8',
      disposition: `attachment; filename="leads_${jobId}.csv"`,
    });
  }

  @Post('cancel/:jobId')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async cancel(
    @Param('jobId') jobId: string,
  ): Promise<ResponseEntity<JobStatusView>> {
    return ResponseEntity.OK_WITH(
      await this.orchestrator.cancel(jobId),
      'Job cancelled',
    );
  }

  @Get('jobs')
  @Version('1')
  async jobs(): Promise<ResponseEntity<JobStatusView[]>> {
    return ResponseEntity.OK_WITH(await this.orchestrator.listJobs());
  }
}
