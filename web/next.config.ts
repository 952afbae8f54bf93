import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // silence the "inferred root" warning for Turbopack
  turbopack: { root: __dirname },

  // The placement engine ships as TypeScript source from the shared workspace
  transpilePackages: ["panel-shared"],

  async rewrites() {
    // Prefer an explicit API origin when provided (works in prod or dev)
    const configured = (process.env.API_ORIGIN || process.env.NEXT_PUBLIC_API_BASE || "").trim();
    if (configured) {
      return [{ source: "/api/:path*", destination: `${configured.replace(/\/+$/g, "")}/:path*` }];
    }

    // Fallback: in dev, proxy to local API (port 4000)
    if (process.env.NODE_ENV !== "production") {
      return [{ source: "/api/:path*", destination: "http://localhost:4000/:path*" }];
    }
    return [];
  },
};

export default nextConfig;
