// Plain-text fallback for LaTeX when no rendered image is available

const SUPERSCRIPTS: Record<string, string> = {
  "0": "⁰", "1": "¹", "2": "²", "3": "³", "4": "⁴",
  "5": "⁵", "6": "⁶", "7": "⁷", "8": "⁸", "9": "⁹",
  "+": "⁺", "-": "⁻", "=": "⁼", "(": "⁽", ")": "⁾", n: "ⁿ", i: "ⁱ",
};

const SUBSCRIPTS: Record<string, string> = {
  "0": "₀", "1": "₁", "2": "₂", "3": "₃", "4": "₄",
  "5": "₅", "6": "₆", "7": "₇", "8": "₈", "9": "₉",
  "+": "₊", "-": "₋", "=": "₌", "(": "₍", ")": "₎", i: "ᵢ", n: "ₙ",
};

const COMMANDS: Record<string, string> = {
  alpha: "α", beta: "β", gamma: "γ", delta: "δ", epsilon: "ε", varepsilon: "ε",
  zeta: "ζ", eta: "η", theta: "θ", kappa: "κ", lambda: "λ", mu: "μ", nu: "ν",
  xi: "ξ", pi: "π", rho: "ρ", sigma: "σ", tau: "τ", phi: "φ", varphi: "φ",
  chi: "χ", psi: "ψ", omega: "ω",
  Gamma: "Γ", Delta: "Δ", Theta: "Θ", Lambda: "Λ", Pi: "Π", Sigma: "Σ",
  Phi: "Φ", Psi: "Ψ", Omega: "Ω",
  infty: "∞", partial: "∂", nabla: "∇", sum: "∑", prod: "∏", int: "∫",
  pm: "±", mp: "∓", times: "×", div: "÷", cdot: "·", dots: "…", ldots: "…", cdots: "⋯",
  leq: "≤", le: "≤", geq: "≥", ge: "≥", neq: "≠", ne: "≠", approx: "≈",
  equiv: "≡", sim: "∼", propto: "∝",
  in: "∈", notin: "∉", subset: "⊂", subseteq: "⊆", cup: "∪", cap: "∩",
  rightarrow: "→", to: "→", leftarrow: "←", Rightarrow: "⇒", Leftarrow: "⇐",
  leftrightarrow: "↔", mapsto: "↦",
  forall: "∀", exists: "∃", emptyset: "∅", neg: "¬", land: "∧", lor: "∨",
  Re: "ℜ", Im: "ℑ", aleph: "ℵ", ell: "ℓ", hbar: "ℏ",
  quad: " ", qquad: "  ",
};

function mapChars(value: string, table: Record<string, string>): string {
  return Array.from(value, (char) => table[char] ?? char).join("");
}

/**
 * Best-effort LaTeX to Unicode: fractions, roots, sub/superscripts, Greek
 * letters and common operators. Unknown commands are dropped.
 */
export function transliterateLatex(latex: string): string {
  let result = latex;

  result = result.replace(
    /\\frac\{([^{}]+)\}\{([^{}]+)\}/g,
    (_match, num: string, den: string) =>
      `${transliterateLatex(num)}/${transliterateLatex(den)}`
  );

  result = result.replace(
    /\\sqrt\{([^{}]+)\}/g,
    (_match, radicand: string) => `√(${transliterateLatex(radicand)})`
  );

  result = result.replace(/\\([A-Za-z]+)/g, (_match, name: string) =>
    Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : ""
  );
  // Spacing commands such as \, and \;
  result = result.replace(/\\[,;:! ]/g, " ");

  result = result.replace(/\^\{([^{}]+)\}/g, (_match, exp: string) =>
    mapChars(exp, SUPERSCRIPTS)
  );
  result = result.replace(/_\{([^{}]+)\}/g, (_match, sub: string) =>
    mapChars(sub, SUBSCRIPTS)
  );

  result = result.replace(
    /\^([0-9+\-ni])/g,
    (match, char: string) => SUPERSCRIPTS[char] ?? match
  );
  result = result.replace(
    /_([0-9+\-ni])/g,
    (match, char: string) => SUBSCRIPTS[char] ?? match
  );

  return result.replace(/[{}]/g, "");
}
