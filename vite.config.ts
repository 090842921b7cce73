import { defineConfig } from 'vite'

export default defineConfig({
  plugins: [],

  // The kiosk browser points at this dev/preview server
  server: {
    host: '0.0.0.0',
    port: 3000,
  },
})
