import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

const gateway = process.env.INFOGRAPHIC_GATEWAY_URL ?? 'http://localhost:3000';

export default defineConfig({
  plugins: [react()],
  server: {
    proxy: {
      '/api': gateway,
    },
  },
});
