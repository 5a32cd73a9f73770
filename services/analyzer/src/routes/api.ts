import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import { analyzeSpreadsheet, listStations } from '@station-analyzer/pivot';

import { sendWorkbook } from '../download';
import { RequestValidationError, mapErrorToResponse } from '../errors';
import { allowedFile, readMultipartForm, type MultipartForm, type UploadedFile } from '../forms';
import type { AppContext } from '../types';

const analyzeFieldsSchema = z.object({
  stationId: z.string().trim().min(1, 'station_id is required'),
  codes: z.array(z.string().trim().optional()),
  rowOrder: z.enum(['first-seen', 'chronological']).optional(),
  columnMode: z.enum(['code', 'position']).optional()
});

const requireSpreadsheet = (form: MultipartForm): UploadedFile => {
  if (!form.file) {
    throw new RequestValidationError('No file uploaded');
  }
  if (!allowedFile(form.file.filename)) {
    throw new RequestValidationError('Invalid file type. Please upload an Excel file (.xlsx or .xls)');
  }
  return form.file;
};

const sendError = (reply: FastifyReply, error: unknown) => {
  const mapped = mapErrorToResponse(error);
  return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
};

export const registerApiRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/api/stations', async (request, reply) => {
    try {
      const form = await readMultipartForm(request);
      const file = requireSpreadsheet(form);
      return { stations: listStations(file.contents) };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post('/api/analyze', async (request, reply) => {
    try {
      const form = await readMultipartForm(request);
      const file = requireSpreadsheet(form);
      const fields = analyzeFieldsSchema.parse({
        stationId: form.fields.get('station_id') ?? '',
        codes: [form.fields.get('code_1'), form.fields.get('code_2')],
        rowOrder: form.fields.get('row_order') || ctx.config.rowOrder,
        columnMode: form.fields.get('column_mode') || undefined
      });

      const result = await analyzeSpreadsheet(file.contents, fields);
      if (!result.ok) {
        ctx.metrics.analyses.inc({ outcome: `${result.error.kind}_failed`, source: 'api' });
        if (result.error.kind === 'processing') {
          request.log.error({ err: result.error }, 'Analysis failed');
        }
        return sendError(reply, result.error);
      }

      ctx.metrics.analyses.inc({ outcome: 'succeeded', source: 'api' });
      return sendWorkbook(reply, result.value);
    } catch (error) {
      return sendError(reply, error);
    }
  });
};
