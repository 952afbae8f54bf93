/// <reference types="next" />
/// <reference types="next/types/global" />

declare namespace NodeJS {
  interface ProcessEnv {
    /** Absolute API origin; empty uses the /api rewrite in next.config.ts. */
    NEXT_PUBLIC_API_BASE?: string;
  }
}

declare module "*.css";
