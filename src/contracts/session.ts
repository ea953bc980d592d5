import { z } from "zod";
import { OutlineSchema } from "./outline";

export const SessionStateSchema = z.enum(["COLLECTING", "READY_FOR_DRAFT", "DRAFT_CREATED", "COMPLETED"]);
export type SessionState = z.infer<typeof SessionStateSchema>;

export const TurnRoleSchema = z.enum(["user", "assistant"]);
export type TurnRole = z.infer<typeof TurnRoleSchema>;

export const TurnSchema = z
  .object({
    role: TurnRoleSchema,
    text: z.string(),
    timestamp: z.string().datetime(),
  })
  .strict();
export type Turn = z.infer<typeof TurnSchema>;

export const SessionSchema = z
  .object({
    id: z.string().min(1),
    templateKey: z.string().min(1),
    state: SessionStateSchema,
    history: z.array(TurnSchema),
    // Present only once a draft was created.
    draft: OutlineSchema.nullable(),
    // The rendered deck once COMPLETED.
    artifactId: z.string().nullable(),
    createdAt: z.string().datetime(),
    lastActivity: z.string().datetime(),
  })
  .strict();
export type Session = z.infer<typeof SessionSchema>;

// COLLECTING -> READY_FOR_DRAFT is one-way: once the model signalled it has
// enough, further chat never takes the draft option away again.
const ALLOWED_TRANSITIONS: Record<SessionState, SessionState[]> = {
  COLLECTING: ["READY_FOR_DRAFT"],
  READY_FOR_DRAFT: ["DRAFT_CREATED"],
  DRAFT_CREATED: ["COMPLETED"],
  COMPLETED: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  if (from === to) return true;
  const allowed = ALLOWED_TRANSITIONS[from] ?? [];
  return allowed.includes(to);
}

export const MESSAGE_STATES: readonly SessionState[] = ["COLLECTING", "READY_FOR_DRAFT", "DRAFT_CREATED"];
export const DRAFT_STATES: readonly SessionState[] = ["READY_FOR_DRAFT", "DRAFT_CREATED"];

/**
 * Checks the cross-field rules the schema alone cannot express.
 * The store runs this on every commit.
 */
export function assertSessionInvariants(session: Session): void {
  const hasDraftState = session.state === "DRAFT_CREATED" || session.state === "COMPLETED";
  if (session.draft !== null && !hasDraftState) {
    throw new Error(`Session ${session.id} holds a draft in state ${session.state}`);
  }
  if (session.draft === null && hasDraftState) {
    throw new Error(`Session ${session.id} is ${session.state} without a draft`);
  }
  if (session.artifactId !== null && session.state !== "COMPLETED") {
    throw new Error(`Session ${session.id} holds an artifact in state ${session.state}`);
  }
}
