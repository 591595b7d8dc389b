export type CheckStatus = "pass" | "warn" | "fail";

export type CheckResult = {
  status: CheckStatus;
  message: string;
};

/** A condition verified before any package is touched. `warn` asks the user whether to go on. */
export interface PreflightCheck {
  name: string;
  run(): Promise<CheckResult>;
}

export type Confirm = (question: string) => Promise<boolean>;
