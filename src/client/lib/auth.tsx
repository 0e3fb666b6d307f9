/**
 * Authentication context — provides user identity and auth actions to the
 * entire React tree.
 *
 * The API client and session cache are passed in as props; the provider
 * mirrors the cache into React state through `subscribe`, so a refresh
 * failure anywhere (which clears the cache) logs the user out here too.
 *
 * On mount, if a session is cached, GET /auth/me confirms it and updates the
 * cached profile. An unreachable server keeps the cached profile; any other
 * failure clears the session.
 */
import {
  createContext,
  useContext,
  useState,
  useEffect,
  useCallback,
  type ReactNode,
} from "react";
import type {
  ArtistSignupResponse,
  Profile,
  ProfileSnapshot,
  TokenResponse,
} from "../../shared/types";
import type { ArtistSignupInput, UserSignupInput } from "../../shared/validators/auth";
import { ApiError, NetworkError, SessionExpiredError, type ApiClient } from "./api";
import { stateFromTokens, type SessionCache } from "./session";

export interface AuthContextValue {
  user: ProfileSnapshot | null;
  isLoading: boolean;
  isAuthenticated: boolean;
  login: (username: string, password: string) => Promise<void>;
  signup: (input: UserSignupInput) => Promise<void>;
  signupArtist: (input: ArtistSignupInput) => Promise<void>;
  logout: () => Promise<void>;
}

// Default to null — consumers must be wrapped in AuthProvider (enforced by useAuth).
const AuthContext = createContext<AuthContextValue | null>(null);

export function AuthProvider({
  api,
  session,
  children,
}: {
  api: ApiClient;
  session: SessionCache;
  children: ReactNode;
}) {
  const [user, setUser] = useState<ProfileSnapshot | null>(
    () => session.current?.profile ?? null,
  );
  // Only wait on /auth/me when there is a cached session to confirm.
  const [isLoading, setIsLoading] = useState(() => session.isLoggedIn());

  useEffect(() => session.subscribe((state) => setUser(state?.profile ?? null)), [session]);

  useEffect(() => {
    if (!session.isLoggedIn()) return;
    let cancelled = false;

    api
      .get<Profile>("/auth/me")
      .then((profile) => {
        const current = session.current;
        if (!current) return;
        session.replace({
          ...current,
          profile: {
            id: profile.id,
            username: profile.username,
            email: profile.email,
            role: profile.role,
          },
        });
      })
      .catch((err: unknown) => {
        // Offline or a server fault: stay optimistic and keep the cached profile
        if (err instanceof NetworkError) return;
        if (err instanceof ApiError && err.status !== 401) return;
        // Refused refresh (already cleared by the client) or a fresh token
        // that is still rejected
        session.clear();
      })
      .finally(() => {
        if (!cancelled) setIsLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, [api, session]);

  const login = useCallback(
    async (username: string, password: string) => {
      const tokens = await api.post<TokenResponse>(
        "/auth/login",
        { username, password },
        { auth: false },
      );
      session.replace(stateFromTokens(tokens));
    },
    [api, session],
  );

  // Signup does not return tokens, so a successful signup logs straight in.
  const signup = useCallback(
    async (input: UserSignupInput) => {
      await api.post<Profile>("/user/signup", input, { auth: false });
      await login(input.username, input.password);
    },
    [api, login],
  );

  const signupArtist = useCallback(
    async (input: ArtistSignupInput) => {
      await api.post<ArtistSignupResponse>("/artist/signup", input, { auth: false });
      await login(input.username, input.password);
    },
    [api, login],
  );

  // Best effort on the server, authoritative locally.
  const logout = useCallback(async () => {
    const current = session.current;
    try {
      if (current) {
        await api.post("/auth/logout", { refresh_token: current.refreshToken });
      }
    } catch (err) {
      if (
        !(err instanceof ApiError) &&
        !(err instanceof NetworkError) &&
        !(err instanceof SessionExpiredError)
      ) {
        throw err;
      }
    } finally {
      session.clear();
    }
  }, [api, session]);

  return (
    <AuthContext.Provider
      value={{
        user,
        isLoading,
        isAuthenticated: user !== null,
        login,
        signup,
        signupArtist,
        logout,
      }}
    >
      {children}
    </AuthContext.Provider>
  );
}

/**
 * Hook to access auth state from any component.
 * Throws if called outside AuthProvider.
 */
export function useAuth() {
  const ctx = useContext(AuthContext);
  if (!ctx) {
    throw new Error("useAuth must be used within AuthProvider");
  }
  return ctx;
}
