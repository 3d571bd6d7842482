import type { AnalysisResult, PrescriptionRequest } from "@rxverify/shared-types";

export const API_BASE = import.meta.env.VITE_API_BASE?.trim() || "http://127.0.0.1:8000";

export class BackendError extends Error {
  public constructor(public readonly status?: number) {
    super("Backend Error");
    this.name = "BackendError";
  }
}

/** One request, no retry and no timeout. */
export async function analyzePrescription(
  request: PrescriptionRequest,
): Promise<AnalysisResult> {
  let res: Response;
  try {
    res = await fetch(`${API_BASE}/analyze/`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(request),
    });
  } catch (caught) {
    console.error("Analyze request failed:", caught);
    throw new BackendError();
  }
  if (!res.ok) throw new BackendError(res.status);
  return (await res.json()) as AnalysisResult;
}
