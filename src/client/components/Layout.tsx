/**
 * Application shell layout — renders the persistent sidebar navigation and
 * the main content area via React Router's <Outlet />.
 *
 * Responsive behavior:
 *   - Desktop (lg+): sidebar is always visible as a static column.
 *   - Mobile (<lg): sidebar slides in from the left as an overlay, toggled
 *     by a hamburger button in the top header bar.
 */
import { useState } from "react";
import { NavLink, Outlet, useNavigate } from "react-router-dom";
import { useAuth } from "../lib/auth";

const navItems = [
  { to: "/dashboard", label: "Dashboard" },
  { to: "/songs", label: "Songs" },
  { to: "/genres", label: "Genres" },
];

export default function Layout() {
  const { user, logout } = useAuth();
  const navigate = useNavigate();
  // Controls mobile sidebar visibility; ignored on desktop via CSS (lg:static).
  const [sidebarOpen, setSidebarOpen] = useState(false);

  // Logout never fails locally, so the redirect always happens
  const handleLogout = async () => {
    await logout();
    navigate("/", { replace: true });
  };

  return (
    <div className="flex min-h-screen">
      {/* Backdrop — closes sidebar on tap (mobile only). */}
      {sidebarOpen && (
        <div
          className="fixed inset-0 z-20 bg-black/50 lg:hidden"
          onClick={() => setSidebarOpen(false)}
        />
      )}

      <aside
        className={`fixed inset-y-0 left-0 z-30 flex w-60 flex-col border-r border-cadence-border bg-cadence-surface transition-transform lg:static lg:translate-x-0 ${
          sidebarOpen ? "translate-x-0" : "-translate-x-full"
        }`}
      >
        <div className="flex h-14 items-center px-5">
          <NavLink to="/dashboard" className="text-xl font-bold text-cadence-teal-300">
            Cadence
          </NavLink>
        </div>

        <nav className="flex-1 space-y-1 px-3 py-2">
          {navItems.map((item) => (
            <NavLink
              key={item.to}
              to={item.to}
              onClick={() => setSidebarOpen(false)}
              className={({ isActive }) =>
                `block rounded-md px-3 py-2 text-sm font-medium transition-colors ${
                  isActive
                    ? "bg-cadence-teal-500/15 text-cadence-teal-300"
                    : "text-cadence-slate-400 hover:bg-cadence-border/50 hover:text-white"
                }`
              }
            >
              {item.label}
            </NavLink>
          ))}
        </nav>

        {/* User info pinned to sidebar bottom */}
        <div className="border-t border-cadence-border p-4">
          <div className="flex items-center gap-3">
            <div className="flex h-8 w-8 items-center justify-center rounded-full bg-cadence-border text-sm text-cadence-slate-400">
              {user?.username[0]?.toUpperCase() ?? "?"}
            </div>
            <div className="min-w-0 flex-1">
              <p className="truncate text-sm font-medium text-white">{user?.username ?? "User"}</p>
              <p className="text-xs capitalize text-cadence-slate-500">{user?.role}</p>
            </div>
            <button
              onClick={handleLogout}
              className="text-xs text-cadence-slate-500 transition-colors hover:text-white"
            >
              Logout
            </button>
          </div>
        </div>
      </aside>

      <div className="flex flex-1 flex-col">
        {/* Mobile-only top bar */}
        <header className="flex h-14 items-center border-b border-cadence-border px-4 lg:hidden">
          <button
            onClick={() => setSidebarOpen(true)}
            aria-label="Open menu"
            className="text-cadence-slate-400 hover:text-white"
          >
            <svg className="h-6 w-6" fill="none" viewBox="0 0 24 24" stroke="currentColor">
              <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M4 6h16M4 12h16M4 18h16" />
            </svg>
          </button>
          <span className="ml-3 text-lg font-bold text-cadence-teal-300">Cadence</span>
        </header>

        <main className="flex-1 p-6 lg:p-8">
          <Outlet />
        </main>
      </div>
    </div>
  );
}
