import type { FastifyReply } from 'fastify';
import type { AnalysisOutput } from '@station-analyzer/pivot';

export const XLSX_MEDIA_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function sendWorkbook(reply: FastifyReply, output: AnalysisOutput) {
  return reply
    .status(200)
    .header('Content-Type', XLSX_MEDIA_TYPE)
    .header('Content-Disposition', `attachment; filename="${output.fileName}"`)
    .header('Cache-Control', 'no-store')
    .send(output.workbook);
}
