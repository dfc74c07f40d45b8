'use client';
import Link from 'next/link';
import { usePathname } from 'next/navigation';
import { clsx } from 'clsx';
import { isActive, routes, type RouteItem } from '@/lib/routes';
import { SITE_NAME } from '@/lib/seo';

export default function Nav() {
  const pathname = usePathname();
  return (
    <header className="sticky top-0 z-50 border-b backdrop-blur bg-[color:var(--nav-bg)] border-[color:var(--nav-border)]">
      <div className="container mx-auto flex h-14 items-center justify-between px-4">
        <Link href="/" className="font-semibold tracking-tight text-sm sm:text-base text-[color:var(--text)]">{SITE_NAME}</Link>
        <nav className="flex items-center gap-6 text-sm">
          {routes.map((r: RouteItem) => {
            const active = isActive(pathname, r.href);
            return (
              <Link
                key={r.href}
                href={r.href}
                aria-current={active ? 'page' : undefined}
                className={clsx(
                  'relative px-1 py-1 font-medium transition-colors rounded',
                  'text-[color:var(--muted)] hover:text-[color:var(--text)] focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-blue-500/50',
                  active && 'text-[color:var(--text)] after:absolute after:inset-x-0 after:-bottom-1 after:h-0.5 after:rounded-full after:bg-blue-500',
                )}
              >
                {r.label}
              </Link>
            );
          })}
        </nav>
      </div>
    </header>
  );
}
