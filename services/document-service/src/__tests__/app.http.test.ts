import 'reflect-metadata';
import fs from 'fs';
import path from 'path';
import { Test } from '@nestjs/testing';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from '../app.module';
import { configureApp, createFastifyAdapter } from '../bootstrap';
import { CLASSIFY_SYSTEM_PROMPT } from '../extraction/field-extractor';
import { CompletionRequest } from '../groq/completion.types';
import { COMPLETION_CLIENT, OCR_ENGINE, PDF_RASTERIZER } from '../tokens';
import {
  FakeCompletionClient,
  FakeOcrEngine,
  FakePdfRasterizer,
  makeTempDir,
  multipartFile,
  removeDir,
  testConfig,
} from './helpers';

const RX_TEXT = 'City Hospital\nDr. Rao\nDate: 2024-03-10\nRx: Amoxicillin 500mg twice daily';

const RX_REPLY =
  '```json\n{"category":"Prescription","document_date":"2024-03-10","doctor_name":"Dr. Rao","hospital_name":"City Hospital","summary":"Prescription for amoxicillin 500mg twice daily."}\n```';

const LAB_REPLY =
  '{"category":"Lab Report","document_date":"2024-01-15","doctor_name":"N/A","hospital_name":"Green Clinic","summary":"Blood panel with normal hemoglobin."}';

const isClassification = (req: CompletionRequest): boolean => req.messages[0]?.content === CLASSIFY_SYSTEM_PROMPT;

describe('document-service HTTP API', () => {
  let app: NestFastifyApplication;
  let uploadDir: string;
  let ocr: FakeOcrEngine;
  let searchAnswer: () => string;
  let completion: FakeCompletionClient;

  beforeEach(async () => {
    uploadDir = makeTempDir();
    ocr = new FakeOcrEngine();
    searchAnswer = () => 'No relevant information found.';
    completion = new FakeCompletionClient((req) => {
      if (!isClassification(req)) return searchAnswer();
      return req.messages[1]?.content.includes('Dr. Rao') ? RX_REPLY : LAB_REPLY;
    });

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule.register(testConfig(uploadDir))],
    })
      .overrideProvider(COMPLETION_CLIENT)
      .useValue(completion)
      .overrideProvider(OCR_ENGINE)
      .useValue(ocr)
      .overrideProvider(PDF_RASTERIZER)
      .useValue(new FakePdfRasterizer())
      .compile();

    app = moduleRef.createNestApplication<NestFastifyApplication>(createFastifyAdapter(), { logger: false });
    await configureApp(app);
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
    removeDir(uploadDir);
  });

  const upload = (filename: string, contentType: string, data: string) => {
    const { payload, headers } = multipartFile({ filename, contentType, data });
    return app.inject({ method: 'POST', url: '/upload/', payload, headers });
  };

  it('reports liveness on the root path', async () => {
    const res = await app.inject({ method: 'GET', url: '/' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: 'MediDoc API is running' });
  });

  it('reports health with the database state', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'healthy', service: 'document-service', database: 'connected' });
  });

  it('ingests a prescription image and lists it', async () => {
    const res = await upload('rx_rao.png', 'image/png', RX_TEXT);

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      filename: 'rx_rao.png',
      info: {
        category: 'Prescription',
        document_date: '2024-03-10',
        doctor_name: 'Dr. Rao',
        hospital_name: 'City Hospital',
        summary: 'Prescription for amoxicillin 500mg twice daily.',
      },
      status: 'success',
    });
    expect(fs.readFileSync(path.join(uploadDir, 'rx_rao.png'), 'utf-8')).toBe(RX_TEXT);

    const list = await app.inject({ method: 'GET', url: '/documents/' });
    expect(list.statusCode).toBe(200);
    expect(list.json()).toEqual({
      documents: [
        {
          id: 1,
          filename: 'rx_rao.png',
          category: 'Prescription',
          document_date: '2024-03-10',
          doctor_name: 'Dr. Rao',
          hospital_name: 'City Hospital',
          summary: 'Prescription for amoxicillin 500mg twice daily.',
        },
      ],
      count: 1,
    });
  });

  it('ingests every page of a PDF', async () => {
    const res = await upload('labs.pdf', 'application/pdf', 'Green Clinic\fHemoglobin 13.5 g/dL');

    expect(res.statusCode).toBe(200);
    expect(ocr.calls.map((c) => c.text)).toEqual(['Green Clinic', 'Hemoglobin 13.5 g/dL']);
    expect(completion.requests[0]?.messages[1]?.content).toBe(
      'Medical document text:\n\nGreen Clinic\nHemoglobin 13.5 g/dL'
    );
  });

  it('lists newer documents first', async () => {
    await upload('labs.png', 'image/png', 'Hemoglobin 13.5');
    await upload('rx_rao.png', 'image/png', RX_TEXT);

    const res = await app.inject({ method: 'GET', url: '/documents' });
    expect(res.json().documents.map((d: { filename: string }) => d.filename)).toEqual(['rx_rao.png', 'labs.png']);
  });

  it('rejects unsupported content types', async () => {
    const res = await upload('notes.txt', 'text/plain', 'hello');

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      success: false,
      error: { code: 'UNSUPPORTED_TYPE', message: 'Only PDF and image files are allowed (got text/plain)' },
    });
    expect(fs.readdirSync(uploadDir)).toEqual([]);
  });

  it('rejects empty uploads', async () => {
    const res = await upload('blank.png', 'image/png', '');

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({ code: 'EMPTY_UPLOAD', message: 'Uploaded file is empty' });
  });

  it('rejects unreadable documents and keeps no trace of them', async () => {
    const res = await upload('blur.jpg', 'image/jpeg', '   ');

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: 'EXTRACTION_FAILED',
      message: 'Could not extract text from the uploaded file',
    });
    expect(fs.existsSync(path.join(uploadDir, 'blur.jpg'))).toBe(false);

    const list = await app.inject({ method: 'GET', url: '/documents/' });
    expect(list.json()).toEqual({ documents: [], count: 0 });
  });

  it('requires a multipart body', async () => {
    const res = await app.inject({ method: 'POST', url: '/upload/', payload: { file: 'nope' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({ code: 'VALIDATION_ERROR', message: 'file is required (multipart/form-data)' });
  });

  it('answers from an empty corpus without calling the model', async () => {
    const res = await app.inject({ method: 'GET', url: '/search/?query=hemoglobin' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      answer: 'No documents have been uploaded yet. Please upload some medical documents first.',
      sources: [],
    });
    expect(completion.requests).toHaveLength(0);
  });

  it('answers questions with the documents the answer names', async () => {
    await upload('rx_rao.png', 'image/png', RX_TEXT);
    searchAnswer = () => 'Dr. Rao prescribed amoxicillin (see rx_rao.png).';

    const res = await app.inject({
      method: 'GET',
      url: '/search',
      query: { query: 'Who prescribed amoxicillin?' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      answer: 'Dr. Rao prescribed amoxicillin (see rx_rao.png).',
      sources: [
        {
          filename: 'rx_rao.png',
          summary: 'Prescription for amoxicillin 500mg twice daily.',
          category: 'Prescription',
        },
      ],
    });
    expect(completion.requests[1]?.messages[1]).toEqual({ role: 'user', content: 'Who prescribed amoxicillin?' });
  });

  it('rejects a blank query', async () => {
    const res = await app.inject({ method: 'GET', url: '/search?query=%20%20' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({ code: 'EMPTY_QUERY', message: 'Search query cannot be empty' });
  });

  it('rejects a missing query', async () => {
    const res = await app.inject({ method: 'GET', url: '/search' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('EMPTY_QUERY');
  });

  it('hides model failures behind SEARCH_UNAVAILABLE', async () => {
    await upload('rx_rao.png', 'image/png', RX_TEXT);
    searchAnswer = () => {
      throw new Error('upstream timeout');
    };

    const res = await app.inject({ method: 'GET', url: '/search?query=dose' });

    expect(res.statusCode).toBe(500);
    expect(res.json().error).toEqual({
      code: 'SEARCH_UNAVAILABLE',
      message: 'Search service is currently unavailable',
    });
  });

  it('echoes the caller correlation id in headers and error bodies', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/search?query=',
      headers: { 'x-correlation-id': 'corr-123' },
    });

    expect(res.headers['x-correlation-id']).toBe('corr-123');
    expect(res.json().correlationId).toBe('corr-123');
  });

  it('mints a correlation id when none is sent', async () => {
    const res = await app.inject({ method: 'GET', url: '/' });
    expect(res.headers['x-correlation-id']).toMatch(/^\d+-[0-9a-f]{10}$/);
  });
});
