import { defineConfig } from "vite";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(root, "shared"),
    },
  },
  build: {
    ssr: true,
    target: "node20",
    outDir: "dist/server",
    rollupOptions: {
      input: path.resolve(root, "server/node-build.ts"),
      external: [
        "better-sqlite3",
        "mysql2",
        "mysql2/promise",
        "nodemailer",
        "bcryptjs",
        "express",
        "cors",
        "dotenv",
        "dotenv/config",
        "zod",
      ],
      output: {
        format: "cjs", // use CommonJS for backend
        entryFileNames: "node-build.cjs",
      },
    },
  },
  optimizeDeps: {
    noDiscovery: true,
    include: [],
  },
});
