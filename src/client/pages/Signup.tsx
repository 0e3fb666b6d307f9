/**
 * Signup page — one form for listeners and artists.
 *
 * The body is checked with the same Zod schemas the server uses, so most
 * field errors appear before any request. Server-side 409/422 field errors
 * are shown under the same fields.
 */
import { useState, type FormEvent } from "react";
import { Link, Navigate, useNavigate } from "react-router-dom";
import { useAuth } from "../lib/auth";
import { ApiError, describeError } from "../lib/api";
import { useMounted } from "../lib/useMounted";
import { artistSignupSchema, userSignupSchema } from "../../shared/validators/auth";
import { fieldErrorsFromZod } from "../../shared/validators/errors";
import type { FieldErrors } from "../../shared/types";

type AccountKind = "listener" | "artist";

const FIELDS = [
  { name: "username", label: "Username", type: "text", autoComplete: "username" },
  { name: "first_name", label: "First name", type: "text", autoComplete: "given-name" },
  { name: "last_name", label: "Last name", type: "text", autoComplete: "family-name" },
  { name: "email", label: "Email", type: "email", autoComplete: "email" },
  { name: "password", label: "Password", type: "password", autoComplete: "new-password" },
] as const;

type FieldName = (typeof FIELDS)[number]["name"] | "stage_name" | "bio";

const EMPTY_FORM: Record<FieldName, string> = {
  username: "",
  first_name: "",
  last_name: "",
  email: "",
  password: "",
  stage_name: "",
  bio: "",
};

export default function Signup() {
  const { isAuthenticated, signup, signupArtist } = useAuth();
  const navigate = useNavigate();
  const mounted = useMounted();
  const [kind, setKind] = useState<AccountKind>("listener");
  const [form, setForm] = useState(EMPTY_FORM);
  const [fieldErrors, setFieldErrors] = useState<FieldErrors>({});
  const [error, setError] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState(false);

  if (isAuthenticated && !submitting) {
    return <Navigate to="/dashboard" replace />;
  }

  const update = (name: FieldName, value: string) => setForm((prev) => ({ ...prev, [name]: value }));

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setError(null);

    const { bio, stage_name, ...base } = form;
    const parsed =
      kind === "artist"
        ? artistSignupSchema.safeParse({ ...base, stage_name, bio: bio || undefined })
        : userSignupSchema.safeParse(base);
    if (!parsed.success) {
      setFieldErrors(fieldErrorsFromZod(parsed.error));
      return;
    }
    setFieldErrors({});
    setSubmitting(true);

    try {
      if ("stage_name" in parsed.data) {
        await signupArtist(parsed.data);
      } else {
        await signup(parsed.data);
      }
      navigate("/dashboard", { replace: true });
    } catch (err) {
      if (!mounted.current) return;
      if (err instanceof ApiError && Object.keys(err.errors).length > 0) {
        setFieldErrors(err.errors);
      }
      setError(describeError(err));
    } finally {
      if (mounted.current) setSubmitting(false);
    }
  };

  const renderField = (
    name: FieldName,
    label: string,
    type = "text",
    autoComplete?: string,
  ) => (
    <label key={name} className="block text-sm text-cadence-slate-400">
      {label}
      <input
        name={name}
        type={type}
        autoComplete={autoComplete}
        value={form[name]}
        onChange={(e) => update(name, e.target.value)}
        className="mt-1 w-full rounded-md border border-cadence-border bg-cadence-surface px-3 py-2 text-white"
      />
      {fieldErrors[name]?.map((message) => (
        <span key={message} className="mt-1 block text-xs text-red-400">
          {message}
        </span>
      ))}
    </label>
  );

  return (
    <div className="flex min-h-screen flex-col items-center justify-center px-4 py-10">
      <h1 className="text-3xl font-bold text-cadence-teal-300">Create your account</h1>

      <div className="mt-6 flex gap-2" role="radiogroup" aria-label="Account type">
        {(["listener", "artist"] as const).map((option) => (
          <button
            key={option}
            type="button"
            role="radio"
            aria-checked={kind === option}
            onClick={() => setKind(option)}
            className={`rounded-md px-4 py-2 text-sm font-medium capitalize ${
              kind === option
                ? "bg-cadence-teal-500/15 text-cadence-teal-300"
                : "text-cadence-slate-400 hover:text-white"
            }`}
          >
            {option}
          </button>
        ))}
      </div>

      <form onSubmit={handleSubmit} className="mt-6 w-full max-w-sm space-y-4" noValidate>
        {FIELDS.map((field) => renderField(field.name, field.label, field.type, field.autoComplete))}
        {kind === "artist" && (
          <>
            {renderField("stage_name", "Stage name")}
            {renderField("bio", "Bio (optional)")}
          </>
        )}

        {error && (
          <p role="alert" className="text-sm text-red-400">
            {error}
          </p>
        )}

        <button
          type="submit"
          disabled={submitting}
          className="w-full rounded-lg bg-cadence-teal-500 px-6 py-3 font-medium text-white transition-colors hover:bg-cadence-teal-400 disabled:opacity-50"
        >
          {submitting ? "Creating account..." : "Sign up"}
        </button>
      </form>

      <p className="mt-6 text-sm text-cadence-slate-400">
        Already registered?{" "}
        <Link to="/" className="text-cadence-teal-300 hover:underline">
          Sign in
        </Link>
      </p>
    </div>
  );
}
