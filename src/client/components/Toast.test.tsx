import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { render, screen, act } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { ToastProvider, useToast, TOAST_DURATION_MS } from "./Toast";

// Consumer component to trigger toasts in tests
function ToastTrigger() {
  const toast = useToast();
  return (
    <div>
      <button onClick={() => toast.success("Genre created")}>Show Success</button>
      <button onClick={() => toast.error("Genre already exists")}>Show Error</button>
      <button onClick={() => toast.info("Loading songs")}>Show Info</button>
    </div>
  );
}

function renderWithProvider() {
  return render(
    <ToastProvider>
      <ToastTrigger />
    </ToastProvider>,
  );
}

describe("useToast", () => {
  it("throws when used outside ToastProvider", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    function BadComponent() {
      useToast();
      return null;
    }

    expect(() => render(<BadComponent />)).toThrow("useToast must be used within ToastProvider");

    spy.mockRestore();
  });
});

describe("ToastProvider", () => {
  beforeEach(() => {
    vi.useFakeTimers({ shouldAdvanceTime: true });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("renders children", () => {
    render(
      <ToastProvider>
        <div>Child Content</div>
      </ToastProvider>,
    );

    expect(screen.getByText("Child Content")).toBeTruthy();
  });

  it("announces errors as alerts and other toasts as status", async () => {
    const user = userEvent.setup({ advanceTimers: vi.advanceTimersByTime });
    renderWithProvider();

    await user.click(screen.getByText("Show Error"));
    await user.click(screen.getByText("Show Success"));

    expect(screen.getByRole("alert").textContent).toContain("Genre already exists");
    expect(screen.getByRole("status").textContent).toContain("Genre created");
  });

  it("stacks several toasts", async () => {
    const user = userEvent.setup({ advanceTimers: vi.advanceTimersByTime });
    renderWithProvider();

    await user.click(screen.getByText("Show Success"));
    await user.click(screen.getByText("Show Info"));

    expect(screen.getByText("Genre created")).toBeTruthy();
    expect(screen.getByText("Loading songs")).toBeTruthy();
  });

  it("auto-dismisses after the toast duration", async () => {
    const user = userEvent.setup({ advanceTimers: vi.advanceTimersByTime });
    renderWithProvider();

    await user.click(screen.getByText("Show Info"));
    act(() => {
      vi.advanceTimersByTime(TOAST_DURATION_MS - 1);
    });
    expect(screen.getByText("Loading songs")).toBeTruthy();

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(screen.queryByText("Loading songs")).toBeNull();
  });

  it("dismisses a toast from its close button", async () => {
    const user = userEvent.setup({ advanceTimers: vi.advanceTimersByTime });
    renderWithProvider();

    await user.click(screen.getByText("Show Success"));
    await user.click(screen.getByLabelText("Dismiss"));

    expect(screen.queryByText("Genre created")).toBeNull();
  });

  it("clears pending timers on unmount", async () => {
    const user = userEvent.setup({ advanceTimers: vi.advanceTimersByTime });
    const { unmount } = renderWithProvider();

    await user.click(screen.getByText("Show Success"));
    const clearSpy = vi.spyOn(globalThis, "clearTimeout");
    unmount();

    expect(clearSpy).toHaveBeenCalled();
    clearSpy.mockRestore();
  });
});
