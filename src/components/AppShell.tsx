import { NavLink } from "react-router-dom";
import { useState, type ReactNode } from "react";

const NAV = [
  { to: "/", label: "Dashboard", end: true },
  { to: "/trends", label: "Historical Trends", end: false },
] as const;

export default function AppShell({ children }: { children: ReactNode }) {
  const [menuOpen, setMenuOpen] = useState(false);

  const linkClass = ({ isActive }: { isActive: boolean }) =>
    isActive
      ? "relative px-3 py-2 text-sm font-semibold text-[#1a2e44] transition after:absolute after:bottom-0 after:left-3 after:right-3 after:h-0.5 after:rounded-full after:bg-[#1a2e44] after:content-['']"
      : "px-3 py-2 text-sm font-medium text-gray-500 transition hover:text-gray-800";

  return (
    <div className="min-h-screen bg-[#F7F8FA]">

      {/* ── Top bar ─────────────────────────────────────────────────── */}
      <div className="sticky top-0 z-[1100] border-b border-gray-100 bg-white/90 backdrop-blur-sm">
        <div className="mx-auto flex max-w-6xl items-center justify-between gap-4 px-4 py-3 md:px-6">

          <NavLink to="/" className="flex items-center gap-2">
            <span className="text-xl" aria-hidden>💧</span>
            <span className="text-sm font-bold text-gray-900 sm:text-base">Dam Dash</span>
          </NavLink>

          {/* Desktop nav */}
          <nav className="hidden items-center gap-1 md:flex">
            {NAV.map(item => (
              <NavLink key={item.to} to={item.to} end={item.end} className={linkClass}>
                {item.label}
              </NavLink>
            ))}
          </nav>

          {/* Mobile menu toggle */}
          <button
            type="button"
            onClick={() => setMenuOpen(v => !v)}
            className="flex items-center gap-1.5 rounded-lg border border-gray-200 px-3 py-1.5 text-sm font-medium text-gray-600 hover:bg-gray-50 md:hidden"
            aria-expanded={menuOpen}
          >
            <svg className="h-4 w-4" viewBox="0 0 16 16" fill="none" stroke="currentColor" strokeWidth="1.5" strokeLinecap="round">
              {menuOpen
                ? <><path d="M2 2l12 12M14 2L2 14" /></>
                : <><path d="M2 4h12M2 8h12M2 12h12" /></>}
            </svg>
            {menuOpen ? "Close" : "Menu"}
          </button>
        </div>

        {/* Mobile dropdown */}
        {menuOpen && (
          <div className="border-t border-gray-100 bg-white md:hidden">
            <nav className="mx-auto flex max-w-6xl flex-col gap-0.5 px-4 py-3">
              {NAV.map(item => (
                <MobileLink key={item.to} to={item.to} end={item.end} onClick={() => setMenuOpen(false)}>
                  {item.label}
                </MobileLink>
              ))}
            </nav>
          </div>
        )}
      </div>

      {/* Page content */}
      <div className="mx-auto max-w-6xl px-4 py-5 md:px-6 md:py-7">
        {children}
      </div>
    </div>
  );
}

// ─── Mobile nav link ──────────────────────────────────────────────────────────

function MobileLink({
  to, end, onClick, children,
}: {
  to: string;
  end: boolean;
  onClick: () => void;
  children: ReactNode;
}) {
  return (
    <NavLink
      to={to}
      end={end}
      onClick={onClick}
      className={({ isActive }) =>
        isActive
          ? "rounded-lg bg-[#f0f4f8] px-3 py-2 text-sm font-semibold text-[#1a2e44]"
          : "rounded-lg px-3 py-2 text-sm font-medium text-gray-600 hover:bg-gray-50 hover:text-gray-800"
      }
    >
      {children}
    </NavLink>
  );
}
