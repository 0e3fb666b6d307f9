/**
 * Login page — the public entry screen.
 *
 * Returning users with a cached session are sent straight to /dashboard.
 * A failed login shows the server's `detail` inline; wrong password and
 * unknown username read the same.
 */
import { useState, type FormEvent } from "react";
import { Link, Navigate, useNavigate } from "react-router-dom";
import { useAuth } from "../lib/auth";
import { describeError } from "../lib/api";
import { useMounted } from "../lib/useMounted";
import Spinner from "../components/Spinner";

export default function Login() {
  const { isAuthenticated, isLoading, login } = useAuth();
  const navigate = useNavigate();
  const mounted = useMounted();
  const [username, setUsername] = useState("");
  const [password, setPassword] = useState("");
  const [error, setError] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState(false);

  if (isLoading) {
    return <Spinner fullScreen />;
  }

  if (isAuthenticated) {
    return <Navigate to="/dashboard" replace />;
  }

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setError(null);
    setSubmitting(true);
    try {
      await login(username.trim(), password);
      navigate("/dashboard", { replace: true });
    } catch (err) {
      if (mounted.current) setError(describeError(err));
    } finally {
      if (mounted.current) setSubmitting(false);
    }
  };

  return (
    <div className="flex min-h-screen flex-col items-center justify-center px-4">
      <h1 className="text-4xl font-bold text-cadence-teal-300">Cadence</h1>
      <p className="mt-2 text-cadence-slate-400">Sign in to your music library</p>

      <form onSubmit={handleSubmit} className="mt-8 w-full max-w-sm space-y-4" noValidate>
        <label className="block text-sm text-cadence-slate-400">
          Username
          <input
            name="username"
            autoComplete="username"
            value={username}
            onChange={(e) => setUsername(e.target.value)}
            className="mt-1 w-full rounded-md border border-cadence-border bg-cadence-surface px-3 py-2 text-white"
          />
        </label>
        <label className="block text-sm text-cadence-slate-400">
          Password
          <input
            name="password"
            type="password"
            autoComplete="current-password"
            value={password}
            onChange={(e) => setPassword(e.target.value)}
            className="mt-1 w-full rounded-md border border-cadence-border bg-cadence-surface px-3 py-2 text-white"
          />
        </label>

        {error && (
          <p role="alert" className="text-sm text-red-400">
            {error}
          </p>
        )}

        <button
          type="submit"
          disabled={submitting || !username.trim() || !password}
          className="w-full rounded-lg bg-cadence-teal-500 px-6 py-3 font-medium text-white transition-colors hover:bg-cadence-teal-400 disabled:opacity-50"
        >
          {submitting ? "Signing in..." : "Sign in"}
        </button>
      </form>

      <p className="mt-6 text-sm text-cadence-slate-400">
        New here?{" "}
        <Link to="/signup" className="text-cadence-teal-300 hover:underline">
          Create an account
        </Link>
      </p>
    </div>
  );
}
