export type ValidationCode = "MASS_NOT_CONSERVED" | "NEGATIVE_FLOW" | "NOT_FULLY_WIRED";

export interface ValidationResult {
  ok: boolean;
  code?: ValidationCode;
  message?: string;
}
