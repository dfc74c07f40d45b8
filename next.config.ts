import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  reactStrictMode: true,
  /** Posts and the reading list are read from disk at request time, so the site runs as a server. */
  serverExternalPackages: ['simple-plist'],
};

export default nextConfig;
