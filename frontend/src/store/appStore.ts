import { create } from 'zustand';

// apiKey lives only in memory; nothing here is persisted
interface AppState {
  wsUrl: string;
  apiKey: string;
  setWsUrl: (url: string) => void;
  setApiKey: (key: string) => void;
}

function defaultWsUrl(): string {
  const host = typeof window === 'undefined' ? 'localhost' : window.location.hostname || 'localhost';
  return `ws://${host}:3000/ws/chat`;
}

export const useAppStore = create<AppState>((set) => ({
  wsUrl: defaultWsUrl(),
  apiKey: '',
  setWsUrl: (url) => set({ wsUrl: url }),
  setApiKey: (key) => set({ apiKey: key })
}));
