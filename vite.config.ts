import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// API runs separately (`npm run dev:api`); /api is forwarded to it
export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      '/api': {
        target: `http://localhost:${process.env.PORT ?? 8787}`,
        rewrite: (path) => path.replace(/^\/api/, ''),
      },
    },
  },
});
