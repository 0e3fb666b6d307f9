/**
 * Vite configuration for the Cadence SPA.
 *
 * The API runs as its own Node process (`npm run dev:api`, port 8000). In
 * development Vite proxies /api/* to it with the prefix stripped, so the
 * browser talks to a single origin and no CORS configuration is needed.
 */

import tailwindcss from "@tailwindcss/vite";
import react from "@vitejs/plugin-react";
import { defineConfig } from "vite";

export default defineConfig({
  plugins: [react(), tailwindcss()],
  build: {
    outDir: "./dist",
    emptyOutDir: true,
  },
  server: {
    host: "127.0.0.1", // Bind to IPv4 loopback to avoid IPv6 issues on some systems
    proxy: {
      "/api": {
        target: "http://localhost:8000",
        changeOrigin: true,
        rewrite: (path) => path.replace(/^\/api/, ""),
      },
    },
  },
});
