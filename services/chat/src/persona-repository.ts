import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  logger,
  NotFoundError,
  ValidationError,
  ok,
  err,
  type Result,
} from '@safehouse/shared';
import {
  insertPersona,
  getPersonaRow,
  listPersonaRows,
  updatePersonaRow,
  deletePersonaRow,
  type PersonaRow,
} from './db.js';
import type { PersonaLookup } from './conversation-store.js';
import type { ResolvedPersona } from './types.js';

const log = logger.child({ module: 'persona-repository' });

export interface Persona {
  id: string;
  name: string;
  codename: string;
  biography: string;
  specialty: string;
  createdAt: string;
  updatedAt: string;
}

const personaIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/, 'id may only contain letters, digits, "_" and "-"');

export const createPersonaSchema = z.object({
  id: personaIdSchema.optional(),
  name: z.string().trim().min(1).max(200),
  codename: z.string().trim().min(1).max(200),
  biography: z.string().max(10_000).default(''),
  specialty: z.string().max(500).default(''),
});

export const updatePersonaSchema = createPersonaSchema
  .omit({ id: true })
  .partial()
  .refine((v) => Object.keys(v).length > 0, { message: 'at least one field is required' });

export type CreatePersonaInput = z.input<typeof createPersonaSchema>;
export type UpdatePersonaInput = z.input<typeof updatePersonaSchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

function fromRow(row: PersonaRow): Persona {
  return {
    id: row.id,
    name: row.name,
    codename: row.codename,
    biography: row.biography,
    specialty: row.specialty,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createPersona(input: unknown): Result<Persona, ValidationError> {
  const parsed = createPersonaSchema.safeParse(input);
  if (!parsed.success) {
    return err(new ValidationError('invalid persona', issuesOf(parsed.error)));
  }
  const id = parsed.data.id ?? randomUUID();
  if (getPersonaRow(id)) {
    return err(new ValidationError(`persona ${id} already exists`, [`id: already taken`]));
  }
  const row = insertPersona({ ...parsed.data, id });
  log.info({ personaId: id }, 'persona created');
  return ok(fromRow(row));
}

export function getPersona(id: string): Persona | undefined {
  const row = getPersonaRow(id);
  return row ? fromRow(row) : undefined;
}

export function listPersonas(): Persona[] {
  return listPersonaRows().map(fromRow);
}

export function updatePersona(
  id: string,
  input: unknown,
): Result<Persona, NotFoundError | ValidationError> {
  const parsed = updatePersonaSchema.safeParse(input);
  if (!parsed.success) {
    return err(new ValidationError('invalid persona update', issuesOf(parsed.error)));
  }
  const row = updatePersonaRow(id, parsed.data);
  if (!row) return err(new NotFoundError('persona', id));
  log.info({ personaId: id }, 'persona updated');
  return ok(fromRow(row));
}

/** Removes the persona and, by cascade, its conversations. */
export function deletePersona(id: string): boolean {
  const deleted = deletePersonaRow(id);
  if (deleted) log.info({ personaId: id }, 'persona deleted');
  return deleted;
}

export function toResolvedPersona(persona: Persona): ResolvedPersona {
  return {
    id: persona.id,
    displayName: persona.name,
    promptFacts: [
      `Codename: ${persona.codename}`,
      `Biography: ${persona.biography || 'No additional information available'}`,
      `Specialty: ${persona.specialty || 'covert operations'}`,
    ],
  };
}

export function resolvePersona(id: string): Result<ResolvedPersona, NotFoundError> {
  const persona = getPersona(id);
  if (!persona) return err(new NotFoundError('persona', id));
  return ok(toResolvedPersona(persona));
}

/** PersonaLookup over the personas table. */
export const sqlitePersonaLookup: PersonaLookup = {
  async resolvePersona(id) {
    return resolvePersona(id);
  },
};

export function buildSystemPrompt(persona: ResolvedPersona, opts: { toolsEnabled: boolean }): string {
  const lines = [
    `You are ${persona.displayName}, a spy with the following profile:`,
    '',
    ...persona.promptFacts,
    '',
  ];

  if (opts.toolsEnabled) {
    lines.push(
      'You have access to a tool that looks up mission files. Use it sparingly.',
      '',
      'Rules for tool usage:',
      '1. Only use get_mission_context when the user explicitly gives a mission ID.',
      '2. If the user asks a general question without a mission ID, do not use any tools.',
      '3. If you need mission details but have no ID, ask which mission they mean.',
      '4. Never guess mission IDs. Only use exact matches.',
      '5. If a lookup fails, say so in character instead of inventing the file.',
      '',
    );
  }

  lines.push(
    `Stay in character as ${persona.displayName} at all times.`,
    "Don't be overly verbose.",
    'You may invent details as long as they are consistent with the context.',
  );
  return lines.join('\n');
}
