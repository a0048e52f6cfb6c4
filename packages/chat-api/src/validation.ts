import { ChatRequestBodySchema, type ChatRequestMessage } from '@recap/chat-contract';

type ValidationError = { ok: false; error: string; status: number };
type ValidationSuccess = {
  ok: true;
  value: {
    messages: ChatRequestMessage[];
    sessionId: string | null;
  };
};

function describeIssue(issue: { path: (string | number)[]; message: string }): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

export function validateChatPostBody(body: unknown): ValidationError | ValidationSuccess {
  const parsed = ChatRequestBodySchema.safeParse(body);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    return {
      ok: false,
      error: first ? `Invalid request body (${describeIssue(first)})` : 'Invalid request body',
      status: 400,
    };
  }

  return {
    ok: true,
    value: {
      messages: parsed.data.messages,
      sessionId: parsed.data.session_id ?? null,
    },
  };
}
