/**
 * React SPA entry point for Cadence.
 *
 * Builds the session cache and API client once, then mounts the root React
 * tree into the #root DOM element defined in index.html. BrowserRouter is
 * placed here (outside App) so that the router context is available to every
 * component, including the AuthProvider inside App.
 * Tailwind v4 styles are imported via index.css which contains the @theme definitions.
 */
import React, { Component, type ReactNode, type ErrorInfo } from "react";
import ReactDOM from "react-dom/client";
import { BrowserRouter } from "react-router-dom";
import App from "./App";
import { ApiClient } from "./lib/api";
import { SessionCache } from "./lib/session";
import { browserStores } from "./lib/storage";
import "./styles/index.css";

class ErrorBoundary extends Component<
  { children: ReactNode },
  { error: Error | null }
> {
  state: { error: Error | null } = { error: null };
  static getDerivedStateFromError(error: Error) {
    return { error };
  }
  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error("[ErrorBoundary]", error, info.componentStack);
  }
  render() {
    if (this.state.error) {
      return (
        <div style={{ padding: 32, color: "#ff6b6b", fontFamily: "monospace" }}>
          <h1>Render Error</h1>
          <pre style={{ whiteSpace: "pre-wrap" }}>
            {this.state.error.message}
          </pre>
        </div>
      );
    }
    return this.props.children;
  }
}

const { secrets, storage } = browserStores();
const session = new SessionCache(secrets, storage);
session.load();

// The dev server proxies /api to the API; in production both share an origin.
const api = new ApiClient(session, {
  baseUrl: new URL("/api", window.location.origin).toString(),
});

const root = document.getElementById("root");
if (!root) {
  throw new Error("Missing #root element in index.html");
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <ErrorBoundary>
      <BrowserRouter>
        <App api={api} session={session} />
      </BrowserRouter>
    </ErrorBoundary>
  </React.StrictMode>,
);
