export type RouteItem = { label: string; href: string };

export const routes: RouteItem[] = [
  { label: 'Home', href: '/' },
  { label: 'Blog', href: '/blog' },
  { label: 'Reading', href: '/reading' },
  { label: 'CV', href: '/cv' },
];

export function isActive(pathname: string, href: string): boolean {
  return href === '/' ? pathname === '/' : pathname === href || pathname.startsWith(`${href}/`);
}
