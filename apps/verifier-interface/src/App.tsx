import { useState } from "react";
import type { AnalysisResult } from "@rxverify/shared-types";
import { analyzePrescription } from "./api";

type RequestState =
  | { status: "idle" }
  | { status: "submitting" }
  | { status: "rendered"; result: AnalysisResult }
  | { status: "failed" };

const MIN_AGE = 0;
const MAX_AGE = 100;
const DEFAULT_AGE = 25;

function ResultList({ items, emptyText }: { items: string[]; emptyText: string }) {
  if (items.length === 0) {
    return <p className="empty-state">{emptyText}</p>;
  }
  return (
    <ul className="result-list">
      {items.map((item) => (
        <li key={item}>{item}</li>
      ))}
    </ul>
  );
}

function ResultTable({
  entries,
  valueHeading,
  emptyText,
}: {
  entries: Record<string, string>;
  valueHeading: string;
  emptyText: string;
}) {
  const rows = Object.entries(entries);
  if (rows.length === 0) {
    return <p className="empty-state">{emptyText}</p>;
  }
  return (
    <table className="result-table">
      <thead>
        <tr>
          <th>Drug</th>
          <th>{valueHeading}</th>
        </tr>
      </thead>
      <tbody>
        {rows.map(([drug, value]) => (
          <tr key={drug}>
            <td>{drug}</td>
            <td>{value}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}

function AnalysisSections({ result }: { result: AnalysisResult }) {
  return (
    <>
      <section className="card" aria-labelledby="extracted-heading">
        <h2 id="extracted-heading">Extracted Drug Names</h2>
        <ResultList items={result.extracted_drugs} emptyText="No drug names extracted." />
      </section>

      <section className="card" aria-labelledby="interactions-heading">
        <h2 id="interactions-heading">Drug Interactions</h2>
        <ResultList items={result.interactions} emptyText="No harmful interactions found." />
      </section>

      <section className="card" aria-labelledby="dosage-heading">
        <h2 id="dosage-heading">Dosage Recommendations</h2>
        <ResultTable
          entries={result.dosage_info}
          valueHeading="Dosage"
          emptyText="No dosage information available."
        />
      </section>

      <section className="card" aria-labelledby="alternatives-heading">
        <h2 id="alternatives-heading">Alternative Suggestions</h2>
        <ResultTable
          entries={result.alternatives}
          valueHeading="Alternative"
          emptyText="No alternatives suggested."
        />
      </section>
    </>
  );
}

export function App() {
  const [text, setText] = useState("");
  const [age, setAge] = useState(DEFAULT_AGE);
  const [state, setState] = useState<RequestState>({ status: "idle" });

  const isSubmitting = state.status === "submitting";

  const handleAnalyze = async () => {
    setState({ status: "submitting" });
    try {
      const result = await analyzePrescription({ text, age });
      setState({ status: "rendered", result });
    } catch {
      setState({ status: "failed" });
    }
  };

  return (
    <main className="verifier-page">
      <header className="verifier-header">
        <h1>Prescription Verifier</h1>
        <p className="subhead">Enter medical prescription text:</p>
      </header>

      <section className="card">
        <div className="form-group">
          <label htmlFor="prescription-text">Prescription Text</label>
          <textarea
            id="prescription-text"
            value={text}
            onChange={(e) => setText(e.target.value)}
            placeholder="Example: Take ibuprofen 200mg twice daily with food."
            rows={6}
            className="prescription-textarea"
          />
        </div>

        <div className="form-group">
          <label htmlFor="patient-age">Select Patient Age: {age}</label>
          <input
            id="patient-age"
            type="range"
            min={MIN_AGE}
            max={MAX_AGE}
            step={1}
            value={age}
            onChange={(e) => setAge(Number(e.target.value))}
          />
        </div>

        <button
          className="btn btn-primary"
          onClick={() => void handleAnalyze()}
          disabled={isSubmitting}
        >
          {isSubmitting ? "Analyzing..." : "Analyze Prescription"}
        </button>
      </section>

      {state.status === "failed" && (
        <div className="error-message" role="alert">
          Backend Error
        </div>
      )}

      {state.status === "rendered" && <AnalysisSections result={state.result} />}
    </main>
  );
}
