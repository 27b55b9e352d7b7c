import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'TextSlides',
      formats: ['es', 'cjs'],
      fileName: (format) => (format === 'es' ? 'text-slides.es.js' : 'text-slides.cjs'),
    },
  },
});
