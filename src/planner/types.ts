export type TaskVariant = "cask" | "formula";

/** One package to install or upgrade. Tasks are independent of each other. */
export type InstallTask = {
  id: string;
  variant: TaskVariant;
};
