/**
 * Root application component — owns routing and the authentication boundary.
 *
 * Route structure:
 *   /           → Login   (public, redirects to /dashboard if already authed)
 *   /signup     → Signup  (public)
 *   /dashboard  → Dashboard ┐
 *   /songs      → Songs     │ Wrapped in ProtectedRoute + Layout
 *   /genres     → Genres    ┘
 *
 * The API client and session cache are created once in main.tsx and handed
 * down here; when the cache is cleared (logout or a refused refresh) the
 * protected routes fall back to the login screen.
 */
import { Routes, Route, Navigate } from "react-router-dom";
import { AuthProvider } from "./lib/auth";
import { ApiProvider } from "./lib/api-context";
import type { ApiClient } from "./lib/api";
import type { SessionCache } from "./lib/session";
import { ToastProvider } from "./components/Toast";
import ProtectedRoute from "./components/ProtectedRoute";
import Layout from "./components/Layout";
import Login from "./pages/Login";
import Signup from "./pages/Signup";
import Dashboard from "./pages/Dashboard";
import Songs from "./pages/Songs";
import Genres from "./pages/Genres";

export default function App({ api, session }: { api: ApiClient; session: SessionCache }) {
  return (
    <ApiProvider client={api}>
      <AuthProvider api={api} session={session}>
        <ToastProvider>
          <Routes>
            <Route path="/" element={<Login />} />
            <Route path="/signup" element={<Signup />} />
            {/* Layout route: ProtectedRoute enforces auth, Layout provides the
                sidebar shell with an <Outlet /> for child pages. */}
            <Route
              element={
                <ProtectedRoute>
                  <Layout />
                </ProtectedRoute>
              }
            >
              <Route path="/dashboard" element={<Dashboard />} />
              <Route path="/songs" element={<Songs />} />
              <Route path="/genres" element={<Genres />} />
            </Route>
            <Route path="*" element={<Navigate to="/" replace />} />
          </Routes>
        </ToastProvider>
      </AuthProvider>
    </ApiProvider>
  );
}
