import type { FastifyReply, FastifyRequest } from 'fastify';

import type { WizardSession, WizardSessionStore } from './store';

export const SESSION_COOKIE = 'station_wizard';

export type WizardContext = {
  token: string | null;
  session: WizardSession | null;
};

/**
 * Resolves the wizard state of the current request from its signed cookie.
 */
export async function resolveWizardContext(request: FastifyRequest, store: WizardSessionStore): Promise<WizardContext> {
  const raw = request.cookies[SESSION_COOKIE];
  if (!raw) {
    return { token: null, session: null };
  }
  const unsigned = request.unsignCookie(raw);
  if (!unsigned.valid || !unsigned.value) {
    return { token: null, session: null };
  }
  return { token: unsigned.value, session: await store.get(unsigned.value) };
}

export function attachSessionCookie(reply: FastifyReply, session: WizardSession): void {
  const maxAge = Math.max(1, Math.floor((session.expiresAt.getTime() - session.createdAt.getTime()) / 1000));
  reply.setCookie(SESSION_COOKIE, session.token, {
    path: '/',
    httpOnly: true,
    sameSite: 'lax',
    signed: true,
    maxAge
  });
}

export function clearSessionCookie(reply: FastifyReply): void {
  reply.clearCookie(SESSION_COOKIE, { path: '/' });
}
