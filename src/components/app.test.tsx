/**
 * @jest-environment jsdom
 */
import React from "react";
import { fireEvent, render, screen, within } from "@testing-library/react";
import { App } from "./app";
import { createParameterStore } from "../simulation/parameter-store";
import { createPresetStore } from "../simulation/preset-store";
import { MemoryStorage } from "../test-utils/memory-storage";

interface CanvasProps {
  brush: { radius: number };
}

// Mock the SimulationCanvas since PixiJS requires a real canvas context
const mockCanvasProps = jest.fn<void, [CanvasProps]>();
jest.mock("./simulation-canvas", () => ({
  SimulationCanvas: (props: CanvasProps) => {
    mockCanvasProps(props);
    return <div data-testid="simulation-canvas" />;
  },
}));

function renderApp() {
  const storage = new MemoryStorage();
  const parameterStore = createParameterStore({ storage });
  const presetStore = createPresetStore({ storage });
  render(<App parameterStore={parameterStore} presetStore={presetStore} />);
  return { parameterStore, presetStore };
}

describe("App component", () => {
  it("renders controls and canvas", () => {
    renderApp();
    expect(screen.getByText("Pause")).toBeDefined();
    expect(screen.getByText("Reinitialize")).toBeDefined();
    expect(screen.getByText(/Speed:/)).toBeDefined();
    expect(screen.getByText(/Brush radius/)).toBeDefined();
    expect(screen.getByTestId("channel-red")).toBeDefined();
    expect(screen.getByTestId("channel-green")).toBeDefined();
    expect(screen.getByTestId("channel-blue")).toBeDefined();
    expect(screen.getByTestId("simulation-canvas")).toBeDefined();
  });

  it("enables single steps only while paused", () => {
    renderApp();
    const stepButton = screen.getByText("Step");
    expect(stepButton.hasAttribute("disabled")).toBe(true);
    fireEvent.click(screen.getByText("Pause"));
    expect(screen.getByText("Play")).toBeDefined();
    expect(stepButton.hasAttribute("disabled")).toBe(false);
  });

  it("lets the brush radius go down to zero, which turns the brush off", () => {
    renderApp();
    fireEvent.change(screen.getByLabelText(/Brush radius/), { target: { value: "0" } });
    expect(screen.getByText("Brush radius: off")).toBeDefined();
    expect(mockCanvasProps.mock.lastCall?.[0].brush.radius).toBe(0);
  });

  it("writes filter edits to the parameter store", () => {
    const { parameterStore } = renderApp();
    fireEvent.change(screen.getByLabelText("red filter 0,0"), { target: { value: "0.5" } });
    expect(parameterStore.getState().settings.red.filter[4]).toBe(0.5);
  });

  it("shows why an expression was rejected", () => {
    const { parameterStore } = renderApp();
    const before = parameterStore.getState().settings;
    fireEvent.change(screen.getByLabelText("green activation"), { target: { value: "expression" } });
    fireEvent.change(screen.getByLabelText("green expression"), { target: { value: "x + y" } });
    fireEvent.click(screen.getByText("Apply"));

    expect(screen.getByRole("alert").textContent)
      .toBe('Invalid activation "x + y": unknown variable(s) y; only x is allowed');
    expect(parameterStore.getState().settings).toBe(before);
  });

  it("applies a valid expression", () => {
    const { parameterStore } = renderApp();
    fireEvent.change(screen.getByLabelText("blue activation"), { target: { value: "expression" } });
    fireEvent.change(screen.getByLabelText("blue expression"), { target: { value: "x/3" } });
    fireEvent.click(screen.getByText("Apply"));
    expect(parameterStore.getState().settings.blue.activation).toEqual({ kind: "expression", expression: "x/3" });
    expect(screen.queryByRole("alert")).toBeNull();
  });

  it("saves the channel's filter as a preset", () => {
    const info = jest.spyOn(console, "info").mockImplementation(() => undefined);
    const { presetStore } = renderApp();
    const red = within(screen.getByTestId("channel-red"));
    fireEvent.change(red.getByLabelText("red preset name"), { target: { value: "center" } });
    fireEvent.click(red.getByText("Save filter"));
    expect(presetStore.getState().filterPresets).toEqual([
      { name: "center", filter: [0, 0, 0, 0, 1, 0, 0, 0, 0] },
    ]);
    info.mockRestore();
  });
});
