import { errorResponse, getChatDebugLogs } from '@recap/chat-api';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(): Promise<Response> {
  if (process.env.NODE_ENV === 'production') {
    return errorResponse('Chat logs are not exposed in production.', 403);
  }
  return Response.json({ logs: getChatDebugLogs() });
}
