import type { Config } from 'tailwindcss'

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        primary: '#6366f1',
        secondary: '#34d399',
        surface: '#0f172a',
      },
    },
  },
  plugins: [],
} satisfies Config
