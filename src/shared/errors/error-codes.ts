export const ErrorCodes = {
  // Auth (1xxx)
  UNAUTHORIZED: 'AUTH_1001',
  INVALID_TOKEN: 'AUTH_1002',

  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_2001',

  // Resource (3xxx)
  NOT_FOUND: 'RES_3001',
  BAD_REQUEST: 'RES_3003',

  // Rate Limit (4xxx)
  RATE_LIMITED: 'RATE_4001',

  // Server (5xxx)
  INTERNAL_ERROR: 'SRV_5001',

  // Catalog (6xxx)
  WORKSHOP_HAS_REGISTRATIONS: 'CAT_6001',
  SCHOOL_NAME_TAKEN: 'CAT_6002',

  // Registration (7xxx)
  WORKSHOP_CLOSED: 'REG_7001',
  WORKSHOP_FULL: 'REG_7002',
  INVALID_GRADE: 'REG_7003',
  INVALID_PHONE: 'REG_7004',
  INVALID_EMAIL: 'REG_7005',
  INVALID_STUDENT_NAME: 'REG_7006',
  INVALID_SCHOOL: 'REG_7007',
  DUPLICATE_REGISTRATION: 'REG_7008',
  TERMS_NOT_ACCEPTED: 'REG_7009',
  REGISTRATION_NUMBER_COLLISION: 'REG_7010',

  // Payment (8xxx)
  GATEWAY_ERROR: 'PAY_8001',
  PAYMENT_NOT_FOUND: 'PAY_8002',
  PAYMENT_ALREADY_INITIATED: 'PAY_8003',
  VALIDATION_FAILED: 'PAY_8004',
  AMOUNT_MISMATCH: 'PAY_8005',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
