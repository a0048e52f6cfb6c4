import type { NextRequest } from 'next/server';
import { getChatApp } from '@/server/chat/pipeline';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest): Promise<Response> {
  const { handler } = await getChatApp();
  return handler.chat(request);
}
