/* Dynamic values of the evaluator */

export type NumberValue = { k: "Number"; v: number; float: boolean };
export type TextValue = { k: "Text"; v: string };
export type BoolValue = { k: "Bool"; v: boolean };
export type UnsetValue = { k: "Unset" };

export type Value = NumberValue | TextValue | BoolValue | UnsetValue;

export const int = (v: number): NumberValue => ({ k: "Number", v, float: false });
export const float = (v: number): NumberValue => ({ k: "Number", v, float: true });
export const text = (v: string): TextValue => ({ k: "Text", v });
export const bool = (v: boolean): BoolValue => ({ k: "Bool", v });
export const UNSET: UnsetValue = { k: "Unset" };

/** Floats keep a decimal place so `4 / 2` reads as `2.0`. */
export function formatNumber(n: NumberValue): string {
  if (n.float && Number.isInteger(n.v)) return n.v.toFixed(1);
  return String(n.v);
}

export function display(v: Value): string {
  switch (v.k) {
    case "Number": return formatNumber(v);
    case "Text": return v.v;
    case "Bool": return v.v ? "true" : "false";
    case "Unset": return "unset";
  }
}

export function truthy(v: Value): boolean {
  switch (v.k) {
    case "Bool": return v.v;
    case "Number": return v.v !== 0;
    case "Unset": return false;
    case "Text": return true;
  }
}

export function equals(a: Value, b: Value): boolean {
  if (a.k === "Number" && b.k === "Number") return a.v === b.v;
  if (a.k === "Text" && b.k === "Text") return a.v === b.v;
  if (a.k === "Bool" && b.k === "Bool") return a.v === b.v;
  return a.k === "Unset" && b.k === "Unset";
}
