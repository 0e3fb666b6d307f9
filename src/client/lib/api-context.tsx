/**
 * Makes the injected `ApiClient` available to pages without a module-level
 * singleton. App.tsx provides it next to `AuthProvider`.
 */
import { createContext, useContext, type ReactNode } from "react";
import type { ApiClient } from "./api";

const ApiContext = createContext<ApiClient | null>(null);

export function ApiProvider({ client, children }: { client: ApiClient; children: ReactNode }) {
  return <ApiContext.Provider value={client}>{children}</ApiContext.Provider>;
}

export function useApi(): ApiClient {
  const client = useContext(ApiContext);
  if (!client) {
    throw new Error("useApi must be used within ApiProvider");
  }
  return client;
}
