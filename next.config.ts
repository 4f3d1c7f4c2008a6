import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
	// mammoth pulls in node-only modules; keep it out of the server bundle
	serverExternalPackages: ['mammoth']
};

export default nextConfig;
