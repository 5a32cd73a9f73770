import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import {
  STATIONS,
  STATION_IDS,
  analyzeSpreadsheet,
  isStationId,
  listCodes,
  stationName,
  type AnalysisOutput
} from '@station-analyzer/pivot';

import { sendWorkbook } from '../download';
import { mapErrorToResponse } from '../errors';
import { allowedFile, readMultipartForm, secureFilename } from '../forms';
import { attachSessionCookie, clearSessionCookie, resolveWizardContext } from '../session/context';
import type { WizardSession } from '../session/store';
import type { AppContext } from '../types';

const indexQuerySchema = z.object({
  error: z.string().trim().max(500).optional()
});

const CHART_SLOTS = [1, 2] as const;

export const registerWizardRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const renderIndex = async (
    reply: FastifyReply,
    options: { statusCode?: number; message?: string; selectedStation?: string } = {}
  ) => {
    const html = await ctx.views.render('index', {
      stations: STATIONS,
      message: options.message,
      selectedStation: options.selectedStation
    });
    return reply.status(options.statusCode ?? 200).type('text/html; charset=utf-8').send(html);
  };

  const redirectWithError = (reply: FastifyReply, message: string) =>
    reply.code(303).redirect(`/?error=${encodeURIComponent(message)}`);

  app.get('/', async (request, reply) => {
    const parsed = indexQuerySchema.safeParse(request.query);
    return renderIndex(reply, { message: parsed.success ? parsed.data.error : undefined });
  });

  app.post('/upload', async (request, reply) => {
    let stored: WizardSession | null = null;
    let stationId = '';

    const reject = async (message: string, statusCode = 400) => {
      if (stored) {
        await ctx.sessions.discard(stored.token, 'rejected');
        stored = null;
      }
      ctx.metrics.uploads.inc({ outcome: 'rejected' });
      request.log.info({ reason: message }, 'Upload rejected');
      return renderIndex(reply, { statusCode, message, selectedStation: stationId });
    };

    try {
      const form = await readMultipartForm(request);
      stationId = form.fields.get('station_id')?.trim() ?? '';
      const file = form.file;

      if (!file) {
        return await reject('No file selected');
      }
      if (!stationId) {
        return await reject('Please provide a Station ID');
      }
      if (!allowedFile(file.filename)) {
        return await reject('Invalid file type. Please upload an Excel file (.xlsx or .xls)');
      }
      if (!isStationId(stationId)) {
        return await reject(`Invalid Station ID. Please select either ${STATION_IDS.join(' or ')}`);
      }

      const previous = await resolveWizardContext(request, ctx.sessions);
      if (previous.token) {
        await ctx.sessions.discard(previous.token, 'replaced');
      }
      await ctx.sessions.sweepExpired();

      const filename = secureFilename(file.filename) || 'upload.xlsx';
      const session = await ctx.sessions.create({
        stationId,
        originalFilename: filename,
        contents: file.contents
      });
      stored = session;

      const codes = listCodes(file.contents, stationId);
      if (codes.length === 0) {
        return await reject(`No codes found for station ${stationId} in the uploaded file`);
      }

      attachSessionCookie(reply, session);
      ctx.metrics.uploads.inc({ outcome: 'accepted' });
      request.log.info({ token: session.token, stationId, codes: codes.length }, 'Upload accepted');

      const html = await ctx.views.render('select', {
        station: { id: stationId, name: stationName(stationId) },
        codes,
        filename,
        slots: CHART_SLOTS
      });
      return reply.type('text/html; charset=utf-8').send(html);
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      if (mapped.statusCode >= 500) {
        request.log.error({ err: error }, 'Upload failed');
      }
      return reject(
        mapped.statusCode >= 500 ? `Error processing upload: ${mapped.message}` : mapped.message,
        mapped.statusCode
      );
    }
  });

  app.post('/analyze', async (request, reply) => {
    const wizard = await resolveWizardContext(request, ctx.sessions);
    const session = wizard.session;
    if (!session) {
      clearSessionCookie(reply);
      return redirectWithError(reply, 'Your upload session has expired. Please upload the file again.');
    }

    let output: AnalysisOutput | null = null;
    let failure: string | null = null;
    try {
      const form = await readMultipartForm(request, { required: false });
      const codes = CHART_SLOTS.map((slot) => form.fields.get(`code_${slot}`));
      const contents = await ctx.sessions.readFile(session);
      const result = await analyzeSpreadsheet(contents, {
        stationId: session.stationId,
        codes,
        rowOrder: ctx.config.rowOrder
      });

      if (result.ok) {
        output = result.value;
        ctx.metrics.analyses.inc({ outcome: 'succeeded', source: 'wizard' });
        request.log.info(
          { token: session.token, stationId: session.stationId, rows: output.matrix.rows.length },
          'Analysis workbook generated'
        );
      } else {
        failure = result.error.message;
        ctx.metrics.analyses.inc({ outcome: `${result.error.kind}_failed`, source: 'wizard' });
        if (result.error.kind === 'processing') {
          request.log.error({ err: result.error, token: session.token }, 'Analysis failed');
        }
      }
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      failure = mapped.statusCode >= 500 ? 'Error processing file' : mapped.message;
      ctx.metrics.analyses.inc({ outcome: 'processing_failed', source: 'wizard' });
      request.log.error({ err: error, token: session.token }, 'Analysis failed');
    } finally {
      await ctx.sessions.discard(session.token, 'completed');
    }

    clearSessionCookie(reply);
    if (!output) {
      return redirectWithError(reply, failure ?? 'Error processing file');
    }
    return sendWorkbook(reply, output);
  });

  app.post('/cancel', async (request, reply) => {
    const wizard = await resolveWizardContext(request, ctx.sessions);
    if (wizard.token) {
      await ctx.sessions.discard(wizard.token, 'cancelled');
    }
    clearSessionCookie(reply);
    return reply.code(303).redirect('/');
  });
};
