import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // Workspace packages export their TypeScript sources.
  transpilePackages: [
    '@recap/chat-api',
    '@recap/chat-contract',
    '@recap/chat-data',
    '@recap/chat-llm',
    '@recap/chat-orchestrator',
  ],
};

export default nextConfig;
