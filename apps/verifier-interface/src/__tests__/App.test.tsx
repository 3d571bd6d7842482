// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen, within } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AnalysisResult } from "@rxverify/shared-types";
import { App } from "../App";

const analysis: AnalysisResult = {
  extracted_drugs: ["ibuprofen", "aspirin"],
  interactions: ["ibuprofen interacts with aspirin"],
  dosage_info: { ibuprofen: "200mg", aspirin: "Not recommended under age 16" },
  alternatives: { ibuprofen: "paracetamol", aspirin: "paracetamol" },
};

function okResponse(body: AnalysisResult) {
  return { ok: true, status: 200, json: async () => body };
}

function tableRows(section: HTMLElement) {
  return within(section)
    .getAllByRole("row")
    .slice(1)
    .map((row) => within(row).getAllByRole("cell").map((cell) => cell.textContent));
}

const fetchMock = vi.fn();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  cleanup();
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("App", () => {
  it("sends the text and age once and renders every section", async () => {
    fetchMock.mockResolvedValue(okResponse(analysis));
    const user = userEvent.setup();
    render(<App />);

    await user.type(screen.getByLabelText("Prescription Text"), "Take ibuprofen and aspirin");
    fireEvent.change(screen.getByLabelText(/Select Patient Age/), { target: { value: "14" } });
    await user.click(screen.getByRole("button", { name: "Analyze Prescription" }));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith("http://127.0.0.1:8000/analyze/", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text: "Take ibuprofen and aspirin", age: 14 }),
    });

    const extracted = await screen.findByRole("region", { name: "Extracted Drug Names" });
    expect(within(extracted).getAllByRole("listitem").map((item) => item.textContent)).toEqual([
      "ibuprofen",
      "aspirin",
    ]);

    const interactions = screen.getByRole("region", { name: "Drug Interactions" });
    expect(within(interactions).getByText("ibuprofen interacts with aspirin")).toBeInTheDocument();

    const dosage = screen.getByRole("region", { name: "Dosage Recommendations" });
    expect(tableRows(dosage)).toEqual([
      ["ibuprofen", "200mg"],
      ["aspirin", "Not recommended under age 16"],
    ]);

    const alternatives = screen.getByRole("region", { name: "Alternative Suggestions" });
    expect(tableRows(alternatives)).toEqual([
      ["ibuprofen", "paracetamol"],
      ["aspirin", "paracetamol"],
    ]);
  });

  it("starts the age slider at 25", () => {
    render(<App />);

    expect(screen.getByLabelText(/Select Patient Age/)).toHaveValue("25");
    expect(screen.getByText("Select Patient Age: 25")).toBeInTheDocument();
  });

  it("shows the no-interaction notice for an empty list", async () => {
    fetchMock.mockResolvedValue(
      okResponse({
        extracted_drugs: ["paracetamol"],
        interactions: [],
        dosage_info: { paracetamol: "500mg" },
        alternatives: {},
      }),
    );
    const user = userEvent.setup();
    render(<App />);

    await user.click(screen.getByRole("button", { name: "Analyze Prescription" }));

    expect(await screen.findByText("No harmful interactions found.")).toBeInTheDocument();
    expect(screen.getByText("No alternatives suggested.")).toBeInTheDocument();
  });

  it("disables the trigger while the request is in flight", async () => {
    let resolve: (value: ReturnType<typeof okResponse>) => void = () => undefined;
    fetchMock.mockReturnValue(
      new Promise((settle) => {
        resolve = settle;
      }),
    );
    const user = userEvent.setup();
    render(<App />);

    await user.click(screen.getByRole("button", { name: "Analyze Prescription" }));

    const pending = screen.getByRole("button", { name: "Analyzing..." });
    expect(pending).toBeDisabled();

    resolve(okResponse(analysis));
    expect(await screen.findByRole("button", { name: "Analyze Prescription" })).toBeEnabled();
  });

  it("shows a generic failure on a non-success status", async () => {
    fetchMock.mockResolvedValue({ ok: false, status: 500, json: async () => ({ code: "server_error" }) });
    const user = userEvent.setup();
    render(<App />);

    await user.click(screen.getByRole("button", { name: "Analyze Prescription" }));

    expect(await screen.findByRole("alert")).toHaveTextContent("Backend Error");
    expect(screen.queryByRole("region", { name: "Extracted Drug Names" })).not.toBeInTheDocument();
  });

  it("shows the same failure when the server is unreachable", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    fetchMock.mockRejectedValue(new TypeError("Failed to fetch"));
    const user = userEvent.setup();
    render(<App />);

    await user.click(screen.getByRole("button", { name: "Analyze Prescription" }));

    expect(await screen.findByRole("alert")).toHaveTextContent("Backend Error");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("replaces an earlier result after a later failure", async () => {
    fetchMock.mockResolvedValueOnce(okResponse(analysis)).mockResolvedValueOnce({ ok: false, status: 503 });
    const user = userEvent.setup();
    render(<App />);

    const trigger = screen.getByRole("button", { name: "Analyze Prescription" });
    await user.click(trigger);
    await screen.findByRole("region", { name: "Drug Interactions" });

    await user.click(screen.getByRole("button", { name: "Analyze Prescription" }));

    expect(await screen.findByRole("alert")).toHaveTextContent("Backend Error");
    expect(screen.queryByRole("region", { name: "Drug Interactions" })).not.toBeInTheDocument();
  });
});
