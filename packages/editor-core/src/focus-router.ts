export type FocusListener = (focusedId: string | null) => void;

export type FocusRouterOptions = {
  /** Guards every `focus` call; ids it rejects leave focus unchanged. */
  canFocus?: (id: string) => boolean;
};

export type FocusRouter = {
  focus: (id: string) => boolean;
  clear: () => void;
  current: () => string | null;
  onChange: (listener: FocusListener) => () => void;
};

export const createFocusRouter = ({ canFocus = () => true }: FocusRouterOptions = {}): FocusRouter => {
  let focusedId: string | null = null;
  const listeners = new Set<FocusListener>();

  const set = (next: string | null) => {
    if (next === focusedId) return;
    focusedId = next;
    listeners.forEach((listener) => listener(focusedId));
  };

  return {
    focus: (id) => {
      if (!canFocus(id)) return false;
      set(id);
      return true;
    },
    clear: () => set(null),
    current: () => focusedId,
    onChange: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }
  };
};
