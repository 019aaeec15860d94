import { z } from "zod";
import { ClientToServerMessage } from "./messageTypes";

const MAX_UTTERANCE_LENGTH = 2000;

const joinSchema = z.object({
  type: z.literal("join"),
  encounterId: z.string().min(1),
});

const patientSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  allergies: z.array(z.string()).default([]),
  medications: z.array(z.string()).default([]),
});

const setPatientSchema = z.object({
  type: z.literal("set_patient"),
  patient: patientSchema.nullable(),
});

const noteOpenedSchema = z.object({
  type: z.literal("note_opened"),
});

const noteClosedSchema = z.object({
  type: z.literal("note_closed"),
});

const utteranceSchema = z.object({
  type: z.literal("utterance"),
  text: z.string().trim().min(1).max(MAX_UTTERANCE_LENGTH),
});

const pingSchema = z.object({
  type: z.literal("ping"),
});

const messageSchema = z.discriminatedUnion("type", [
  joinSchema,
  setPatientSchema,
  noteOpenedSchema,
  noteClosedSchema,
  utteranceSchema,
  pingSchema,
]);

export function validateMessage(msg: unknown): ClientToServerMessage | null {
  const parsed = messageSchema.safeParse(msg);
  if (!parsed.success) return null;
  return parsed.data;
}
