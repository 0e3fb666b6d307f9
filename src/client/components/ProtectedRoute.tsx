/**
 * Route guard that redirects unauthenticated users to the login page.
 *
 * Used as a wrapper around the Layout route in App.tsx, and again around
 * individual pages that only some roles may open.
 *
 * Rendering:
 *   1. isLoading=true   → spinner (waiting for the /auth/me check)
 *   2. !isAuthenticated → redirect to "/" (login)
 *   3. role not allowed → redirect to "/dashboard"
 *   4. otherwise        → children
 */
import { Navigate } from "react-router-dom";
import { useAuth } from "../lib/auth";
import type { Role } from "../../shared/types";
import Spinner from "./Spinner";

export default function ProtectedRoute({
  children,
  roles,
}: {
  children: React.ReactNode;
  roles?: readonly Role[];
}) {
  const { user, isLoading } = useAuth();

  if (isLoading) {
    return <Spinner fullScreen />;
  }

  // `replace` keeps the redirect out of browser history.
  if (!user) {
    return <Navigate to="/" replace />;
  }

  if (roles && !roles.includes(user.role)) {
    return <Navigate to="/dashboard" replace />;
  }

  return <>{children}</>;
}
