export type ConnectivityState = "online" | "offline";

export interface ConnectivityService {
  hasInternetConnection(): Promise<boolean>;
  getCurrentConnectivity(): ConnectivityState;
  onChange(listener: (state: ConnectivityState) => void): () => void;
}

export class BrowserConnectivityService implements ConnectivityService {
  async hasInternetConnection(): Promise<boolean> {
    try {
      return typeof navigator === "undefined" ? true : navigator.onLine;
    } catch {
      return false;
    }
  }

  getCurrentConnectivity(): ConnectivityState {
    if (typeof navigator === "undefined") {
      return "online";
    }
    return navigator.onLine ? "online" : "offline";
  }

  onChange(listener: (state: ConnectivityState) => void): () => void {
    if (typeof window === "undefined") {
      return () => undefined;
    }
    const handleOnline = () => listener("online");
    const handleOffline = () => listener("offline");
    window.addEventListener("online", handleOnline);
    window.addEventListener("offline", handleOffline);
    return () => {
      window.removeEventListener("online", handleOnline);
      window.removeEventListener("offline", handleOffline);
    };
  }
}
