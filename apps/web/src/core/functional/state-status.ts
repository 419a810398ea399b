export type StateStatus =
  | "idle"
  | "loading"
  | "refreshing"
  | "success"
  | "error"
  | "empty"
  | "submitting"
  | "paginating"
  | "noInternet"
  | "unauthorized";

export function isBusy(status: StateStatus): boolean {
  return status === "loading" || status === "refreshing" || status === "submitting" || status === "paginating";
}
