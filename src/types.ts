export type StaffRecord = {
  id: number;
  name: string;
  role: string;
  basic: number;
  housing: number;
  transport: number;
  feeding: number;
  createdAt: Date;
};

// Raw add-staff payload: form fields arrive as text, JSON bodies may carry numbers.
export type StaffSubmission = {
  name?: unknown;
  role?: unknown;
  basic?: unknown;
  housing?: unknown;
  transport?: unknown;
  feeding?: unknown;
};

export type StaffInput = Readonly<{
  name: string;
  role: string;
  basic: number;
  housing: number;
  transport: number;
  feeding: number;
}>;

export type PayrollLine = StaffRecord & {
  gross: number;
  tax: number;
  pension: number;
  net: number;
};

export type PayrollSummary = {
  headcount: number;
  averageGross: number;
  aboveThresholdCount: number;
};

export type FieldIssue = {
  field: string;
  message: string;
};
