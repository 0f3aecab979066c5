export type Subsection = {
  ref: string;
  text: string;
};

type MarkerPattern = {
  re: RegExp;
  ref: (token: string) => string;
};

// (1) before (a) before (ii): a lone "(i)" is read as a letter, "(ii)" as a roman numeral.
const MARKERS: readonly MarkerPattern[] = [
  { re: /^\s*\(\s*(\d+)\s*\)(?:\s+(.*))?$/, ref: (t) => `(${t})` },
  { re: /^\s*\(\s*([a-z])\s*\)(?:\s+(.*))?$/, ref: (t) => `(${t})` },
  { re: /^\s*\(\s*([ivx]+)\s*\)(?:\s+(.*))?$/i, ref: (t) => `(${t.toLowerCase()})` }
];

export function matchSubsectionMarker(line: string): { ref: string; rest: string } | null {
  for (const marker of MARKERS) {
    const m = marker.re.exec(line);
    if (m) return { ref: marker.ref(m[1]), rest: m[2] ?? "" };
  }
  return null;
}

export function splitSubsections(body: string): Subsection[] {
  const out: Subsection[] = [];
  let currentRef = "";
  let buf: string[] = [];

  const flush = () => {
    if (buf.length > 0) out.push({ ref: currentRef, text: buf.join("\n").trim() });
    currentRef = "";
    buf = [];
  };

  for (const line of body.split("\n")) {
    const marker = matchSubsectionMarker(line);
    if (marker) {
      flush();
      currentRef = marker.ref;
      buf.push(marker.rest);
      continue;
    }
    buf.push(line);
  }
  flush();

  return out.filter((s) => s.text.length > 0);
}
