import type { NextRequest } from 'next/server';
import { getChatApp } from '@/server/chat/pipeline';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

// request.signal aborts when the client goes away; the handler chains it into generation.
export async function POST(request: NextRequest): Promise<Response> {
  const { handler } = await getChatApp();
  return handler.stream(request);
}
