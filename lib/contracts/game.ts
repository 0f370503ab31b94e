export const SUIT_ORDER = ['TOUCHSTONE', 'WORKSHOP', 'TOOL', 'PROTOCOL', 'PLATFORM'] as const;

export type Suit = (typeof SUIT_ORDER)[number];

export const REDRAW_ELIGIBLE_SUITS = ['WORKSHOP', 'TOOL', 'PROTOCOL'] as const satisfies ReadonlyArray<Suit>;

export type RedrawSuit = (typeof REDRAW_ELIGIBLE_SUITS)[number];

export const CARD_FIELDS = ['Category1', 'Category2', 'Name', 'Text', 'ShortText', 'URL'] as const;

export type CardField = (typeof CARD_FIELDS)[number];

export type CardRecord = Record<CardField, string>;

export type RedrawFlags = Record<RedrawSuit, boolean>;

export type SessionState = {
  drawn: CardRecord[];
  remaining: number;
  total: number;
  canRedraw?: RedrawFlags;
  redrawUsed?: RedrawFlags;
};
