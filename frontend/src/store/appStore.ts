import { create } from 'zustand';
import { persist } from 'zustand/middleware';

export type Connection = 'offline' | 'connecting' | 'ready';

interface AppState {
  wsUrl: string;
  connection: Connection;
  setWsUrl: (url: string) => void;
  setConnection: (connection: Connection) => void;
}

export const DEFAULT_WS_URL = 'ws://127.0.0.1:7860/ws/chat';

// only the server address survives a reload
export const useAppStore = create<AppState>()(
  persist(
    (set) => ({
      wsUrl: DEFAULT_WS_URL,
      connection: 'offline',
      setWsUrl: (url) => set({ wsUrl: url }),
      setConnection: (connection) => set({ connection })
    }),
    {
      name: 'companion-settings',
      partialize: (state) => ({ wsUrl: state.wsUrl })
    }
  )
);
