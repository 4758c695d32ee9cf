import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Native module and a transport-heavy logger stay out of the server bundle
  serverExternalPackages: ["winston", "better-sqlite3"],
};

export default nextConfig;
