import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { EnrichmentService } from './enrichment.service';
import { CsvService } from '../csv/csv.service';
import { EnrichCompaniesDto } from './dto/enrich-companies.dto';
import { EnrichmentResult } from './interfaces/enrichment-record.interface';
import { InputError } from '../common/errors/input.error';

const UPLOAD_FIELD = 'file';
const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

@Controller('enrichment')
export class EnrichmentController {
  constructor(
    private readonly enrichmentService: EnrichmentService,
    private readonly csvService: CsvService,
  ) {}

  @Post('companies')
  @HttpCode(HttpStatus.OK)
  async enrichCompanies(
    @Body() dto: EnrichCompaniesDto,
  ): Promise<EnrichmentResult> {
    const records = await this.enrichmentService.enrich(dto.companies);
    return { records, summary: this.enrichmentService.summarize(records) };
  }

  @Post('upload')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor(UPLOAD_FIELD))
  async enrichUpload(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<EnrichmentResult> {
    const names = await this.readUpload(file);
    const records = await this.enrichmentService.enrich(names);
    return { records, summary: this.enrichmentService.summarize(records) };
  }

  @Post('upload/export')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', CSV_CONTENT_TYPE)
  @Header(
    'Content-Disposition',
    'attachment; filename="enriched_companies.csv"',
  )
  @UseInterceptors(FileInterceptor(UPLOAD_FIELD))
  async exportUpload(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<string> {
    const names = await this.readUpload(file);
    const records = await this.enrichmentService.enrich(names);
    return this.csvService.toCsv(records);
  }

  @Get('sample')
  @Header('Content-Type', CSV_CONTENT_TYPE)
  @Header('Content-Disposition', 'attachment; filename="sample_companies.csv"')
  sample(): string {
    return this.csvService.sampleCsv();
  }

  private readUpload(file: Express.Multer.File | undefined): Promise<string[]> {
    if (!file) {
      throw new InputError(
        `A CSV file must be uploaded in the '${UPLOAD_FIELD}' field`,
      );
    }
    return this.csvService.parseCompanyNames(file.buffer);
  }
}
