"use client";
import { useTheme } from './ThemeProvider';

export function ThemeToggle() {
  const { theme, toggle } = useTheme();
  return (
    <button
      type="button"
      aria-label={theme === 'dark' ? 'Switch to light theme' : 'Switch to dark theme'}
      onClick={toggle}
      className="inline-flex items-center justify-center h-8 w-8 rounded-full border border-[color:var(--border)] bg-[color:var(--card)] hover:opacity-80 transition text-xs font-medium"
    >
      {theme === 'dark' ? '🌙' : '☀️'}
    </button>
  );
}
