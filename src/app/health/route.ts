import { getChatApp } from '@/server/chat/pipeline';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(): Promise<Response> {
  const { handler } = await getChatApp();
  return handler.health();
}
