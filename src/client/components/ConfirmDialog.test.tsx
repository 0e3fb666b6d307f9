import { describe, it, expect, vi } from "vitest";
import { render, screen } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import ConfirmDialog from "./ConfirmDialog";

const defaultProps = {
  open: true,
  title: "Disable genre",
  description: "Songs in Jazz will stay, but the genre disappears from lists.",
  confirmLabel: "Disable",
  loading: false,
  onConfirm: vi.fn(),
  onCancel: vi.fn(),
};

function renderDialog(overrides: Partial<typeof defaultProps> & { tone?: "danger" | "default" } = {}) {
  const props = {
    ...defaultProps,
    onConfirm: vi.fn(),
    onCancel: vi.fn(),
    ...overrides,
  };
  return { ...render(<ConfirmDialog {...props} />), props };
}

describe("ConfirmDialog", () => {
  it("renders nothing when closed", () => {
    const { container } = renderDialog({ open: false });
    expect(container.innerHTML).toBe("");
  });

  it("renders title, description and both buttons", () => {
    renderDialog();

    expect(screen.getByRole("dialog")).toBeTruthy();
    expect(screen.getByText("Disable genre")).toBeTruthy();
    expect(
      screen.getByText("Songs in Jazz will stay, but the genre disappears from lists."),
    ).toBeTruthy();
    expect(screen.getByText("Disable")).toBeTruthy();
    expect(screen.getByText("Cancel")).toBeTruthy();
  });

  it("calls onConfirm from the confirm button", async () => {
    const { props } = renderDialog();

    await userEvent.click(screen.getByText("Disable"));

    expect(props.onConfirm).toHaveBeenCalledOnce();
    expect(props.onCancel).not.toHaveBeenCalled();
  });

  it("cancels from the cancel button, the backdrop and Escape", async () => {
    const { props, container } = renderDialog();

    await userEvent.click(screen.getByText("Cancel"));
    const backdrop = container.firstElementChild;
    if (!(backdrop instanceof HTMLElement)) throw new Error("no backdrop");
    await userEvent.click(backdrop);
    await userEvent.keyboard("{Escape}");

    expect(props.onCancel).toHaveBeenCalledTimes(3);
  });

  it("does not cancel on a click inside the panel", async () => {
    const { props } = renderDialog();

    await userEvent.click(screen.getByText("Disable genre"));

    expect(props.onCancel).not.toHaveBeenCalled();
  });

  it("disables both buttons and shows a working label while loading", async () => {
    const { props } = renderDialog({ loading: true });

    const confirmBtn = screen.getByText("Working...");
    const cancelBtn = screen.getByText("Cancel");
    expect(confirmBtn.hasAttribute("disabled")).toBe(true);
    expect(cancelBtn.hasAttribute("disabled")).toBe(true);

    await userEvent.keyboard("{Escape}");
    expect(props.onCancel).not.toHaveBeenCalled();
  });

  it("uses the neutral style for tone=default", () => {
    renderDialog({ tone: "default" });
    expect(screen.getByText("Disable").className).toContain("bg-cadence-teal-500");
  });
});
