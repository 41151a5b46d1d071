export const ORDER_SAGA_TYPE = 'ORDER_PROCESSING';

export const ORDER_SAGA_STEPS = {
  RESERVE_INVENTORY: 'ReserveInventory',
  BOOK_PARTNER: 'BookPartner',
  CONFIRM_ORDER: 'ConfirmOrder',
} as const;

export const ORDER_SAGA_TIMEOUT_MS = 30000; // 30 seconds total timeout
