import { useMemo, useState } from "react";

const TOOLS = [
  "get_token",
  "mcid_search",
  "submit_medical",
  "submit_medical_alt",
  "all",
  "debug_transforms",
  "test_connection",
] as const;

type Tool = (typeof TOOLS)[number];

const TOOLS_WITHOUT_BODY: readonly Tool[] = ["get_token", "all"];

const EXAMPLE_PERSON = {
  firstName: "JANE",
  lastName: "DOE",
  ssn: "123456789",
  dateOfBirth: "1985-10-10",
  gender: "F",
  zipCodes: ["10001"],
};

function isTool(value: string): value is Tool {
  return (TOOLS as readonly string[]).includes(value);
}

function readError(body: unknown, status: number): string {
  if (body && typeof body === "object" && "error" in body) {
    return String(body.error);
  }
  return `HTTP ${status}`;
}

export default function Home() {
  const [tool, setTool] = useState<Tool>("mcid_search");
  const [payload, setPayload] = useState(
    JSON.stringify(EXAMPLE_PERSON, null, 2)
  );

  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<unknown>(null);
  const [lastInvokedAt, setLastInvokedAt] = useState<string | null>(null);

  const needsBody = !TOOLS_WITHOUT_BODY.includes(tool);

  const payloadError = useMemo(() => {
    if (!needsBody) return null;
    try {
      JSON.parse(payload);
      return null;
    } catch (e) {
      return e instanceof Error ? e.message : "Invalid JSON";
    }
  }, [needsBody, payload]);

  const embeddedStatus = useMemo(() => {
    if (!result || typeof result !== "object") return null;
    if ("status_code" in result && typeof result.status_code === "number") {
      return result.status_code;
    }
    return null;
  }, [result]);

  async function invoke(): Promise<void> {
    setLoading(true);
    setError(null);
    setResult(null);

    try {
      const res = await fetch(`/tool/${tool}`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: needsBody ? payload : "{}",
      });

      const body: unknown = await res.json();
      if (!res.ok) throw new Error(readError(body, res.status));

      setResult(body);
      setLastInvokedAt(new Date().toISOString());
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to invoke tool");
    } finally {
      setLoading(false);
    }
  }

  return (
    <main>
      <h1>Eligibility Gateway</h1>
      <p>
        Invoke a gateway tool. The gateway answers HTTP 200 for upstream
        rejections too; check <code>status_code</code> and{" "}
        <code>success</code> in the result.
      </p>

      <section>
        <h2>Tool</h2>

        <div>
          <label>
            Tool
            <br />
            <select
              value={tool}
              onChange={(e) => {
                if (isTool(e.target.value)) setTool(e.target.value);
              }}
            >
              {TOOLS.map((t) => (
                <option key={t} value={t}>
                  {t}
                </option>
              ))}
            </select>
          </label>
        </div>

        {needsBody ? (
          <div style={{ marginTop: 12 }}>
            <label>
              JSON payload
              <br />
              <textarea
                value={payload}
                onChange={(e) => setPayload(e.target.value)}
                rows={12}
                style={{ width: "min(640px, 100%)", fontFamily: "monospace" }}
              />
            </label>
            {payloadError ? (
              <p style={{ color: "crimson" }}>
                Invalid JSON: <code>{payloadError}</code>
              </p>
            ) : null}
          </div>
        ) : null}

        <div style={{ marginTop: 12 }}>
          <button
            onClick={() => void invoke()}
            disabled={loading || payloadError !== null}
          >
            {loading ? "Invoking…" : "Invoke"}
          </button>
        </div>
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Result</h2>

        {error ? (
          <p style={{ color: "crimson" }}>
            Error: <code>{error}</code>
          </p>
        ) : null}

        {result !== null ? (
          <>
            <p>
              Last invoked: <code>{lastInvokedAt}</code>
              {embeddedStatus !== null ? (
                <>
                  {" "}
                  · upstream status <strong>{embeddedStatus}</strong>
                </>
              ) : null}
            </p>
            <pre>{JSON.stringify(result, null, 2)}</pre>
          </>
        ) : error ? null : (
          <p>No tool invoked yet.</p>
        )}
      </section>
    </main>
  );
}
