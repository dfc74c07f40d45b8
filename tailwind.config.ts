import type { Config } from 'tailwindcss';

export default {
  content: [
    './src/app/**/*.{ts,tsx}',
    './src/components/**/*.{ts,tsx}',
  ],
  theme: {
    extend: {
      maxWidth: {
        '5xl': '64rem',
      },
    },
  },
  plugins: [],
} satisfies Config;
