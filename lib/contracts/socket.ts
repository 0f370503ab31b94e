export const CLIENT_TO_SERVER_EVENTS = {
  DRAW: 'draw',
  REDRAW: 'redraw',
  RESET: 'reset',
} as const;

export const SERVER_TO_CLIENT_EVENTS = {
  STATE: 'state',
} as const;

// `suit` is what older viewers send; `category` wins when both are present.
export type RedrawRequest = { category?: string; suit?: string };
