import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import request from 'supertest';
import { EnrichmentModule } from './../src/enrichment/enrichment.module';
import { COMPLETION_SERVICE } from './../src/completion/interfaces/completion-service.interface';
import { validateEnvironment } from './../src/config/env.validation';
import {
  ServiceError,
  ServiceErrorKind,
} from './../src/common/errors/service.error';

describe('EnrichmentController (e2e)', () => {
  let app: INestApplication;

  const replies: Record<string, string> = {
    OpenAI:
      'website: openai.com\nindustry: AI\ncompany_size: 500-1000\nhq_location: San Francisco',
    Stripe: 'website: stripe.com\nindustry: Fintech',
  };

  const mockCompletionService = {
    name: 'fake',
    complete: jest.fn((prompt: string): Promise<string> => {
      const company = /Company: (.+)/.exec(prompt)?.[1] ?? '';
      const reply = replies[company];
      return reply
        ? Promise.resolve(reply)
        : Promise.reject(
            new ServiceError('rate limited', ServiceErrorKind.RATE_LIMITED, 429),
          );
    }),
  };

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: validateEnvironment,
        }),
        EnrichmentModule,
      ],
    })
      .overrideProvider(COMPLETION_SERVICE)
      .useValue(mockCompletionService)
      .compile();

    app = moduleFixture.createNestApplication();
    app.useGlobalPipes(new ValidationPipe());
    await app.init();
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  it('/enrichment/companies (POST) - Success with a failed row', async () => {
    const response = await request(app.getHttpServer())
      .post('/enrichment/companies')
      .send({ companies: ['OpenAI', '  ', 'Zoho'] })
      .expect(200);

    expect(response.body).toEqual({
      records: [
        {
          company_name: 'OpenAI',
          website: 'openai.com',
          industry: 'AI',
          company_size: '500-1000',
          hq_location: 'San Francisco',
          status: 'Ok',
          error_message: '',
        },
        {
          company_name: 'Zoho',
          website: '',
          industry: '',
          company_size: '',
          hq_location: '',
          status: 'Failed',
          error_message: 'rate limited',
        },
      ],
      summary: { total: 2, succeeded: 1, failed: 1, successRate: 50 },
    });
  });

  it('/enrichment/companies (POST) - Validation Error', async () => {
    await request(app.getHttpServer())
      .post('/enrichment/companies')
      .send({ companies: 'OpenAI' })
      .expect(400);
  });

  it('/enrichment/companies (POST) - Only blank names', async () => {
    const response = await request(app.getHttpServer())
      .post('/enrichment/companies')
      .send({ companies: ['', '   '] })
      .expect(400);

    expect(response.body).toEqual({
      statusCode: 400,
      error: 'Bad Request',
      message: 'No valid company names were provided',
    });
  });

  it('/enrichment/upload (POST) - Success', async () => {
    const response = await request(app.getHttpServer())
      .post('/enrichment/upload')
      .attach('file', Buffer.from('company_name\nOpenAI\n\nStripe\n'), {
        filename: 'companies.csv',
        contentType: 'text/csv',
      })
      .expect(200);

    const body = response.body as {
      records: Array<{ company_name: string; website: string; company_size: string }>;
      summary: { total: number };
    };
    expect(body.summary.total).toBe(2);
    expect(body.records.map((record) => record.company_name)).toEqual([
      'OpenAI',
      'Stripe',
    ]);
    expect(body.records[1].website).toBe('stripe.com');
    expect(body.records[1].company_size).toBe('');
  });

  it('/enrichment/upload (POST) - Missing file', async () => {
    const response = await request(app.getHttpServer())
      .post('/enrichment/upload')
      .expect(400);

    expect(response.body.message).toBe(
      "A CSV file must be uploaded in the 'file' field",
    );
  });

  it('/enrichment/upload (POST) - Missing company_name column', async () => {
    const response = await request(app.getHttpServer())
      .post('/enrichment/upload')
      .attach('file', Buffer.from('name\nOpenAI\n'), {
        filename: 'companies.csv',
        contentType: 'text/csv',
      })
      .expect(400);

    expect(response.body.message).toBe(
      "CSV must contain a 'company_name' column (found: name)",
    );
  });

  it('/enrichment/upload/export (POST) - CSV download', async () => {
    const response = await request(app.getHttpServer())
      .post('/enrichment/upload/export')
      .attach('file', Buffer.from('company_name\nOpenAI\nZoho\n'), {
        filename: 'companies.csv',
        contentType: 'text/csv',
      })
      .expect(200);

    expect(response.headers['content-type']).toMatch(/^text\/csv/);
    expect(response.headers['content-disposition']).toBe(
      'attachment; filename="enriched_companies.csv"',
    );
    expect(response.text).toBe(
      [
        'company_name,website,industry,company_size,hq_location,status,error_message',
        'OpenAI,openai.com,AI,500-1000,San Francisco,Ok,',
        'Zoho,,,,,Failed,rate limited',
      ].join('\n'),
    );
  });

  it('/enrichment/sample (GET)', async () => {
    const response = await request(app.getHttpServer())
      .get('/enrichment/sample')
      .expect(200);

    expect(response.text).toBe(
      'company_name\nOpenAI\nDeepMind\nZoho\nFreshworks\nStripe\n',
    );
  });
});
