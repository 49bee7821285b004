export const APP_NAME = 'Compta Cabinet';
export const APP_VERSION = '1.0.0';

export const DEFAULT_API_PORT = 3001;
export const DEFAULT_DB_PORT = 5432;

export const ACCOUNT_TYPES = ['asset', 'liability', 'equity', 'income', 'expense'] as const;

// PCM classes 1..8
export const ACCOUNT_CLASSES = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

export const JOURNAL_TYPES = ['purchases', 'sales', 'cash', 'general'] as const;

export const VAT_FREQUENCIES = ['monthly', 'quarterly'] as const;

export const DOC_TEMPLATE_TYPES = {
  STATUTS: 'statuts',
  PV: 'pv',
} as const;

export const USER_ROLES = {
  ADMIN: 'admin',
  ACCOUNTANT: 'accountant',
} as const;

export const SEQUENCE_SCOPES = {
  INVOICE: 'invoice',
  QUOTE: 'quote',
} as const;

export const DOCUMENT_PREFIXES = {
  invoice: 'INV-',
  quote: 'DEV-',
} as const;

export const DEFAULT_JOURNALS = [
  { code: 'ACH', name: 'Journal des achats', type: 'purchases', prefix: 'ACH-' },
  { code: 'VTE', name: 'Journal des ventes', type: 'sales', prefix: 'VTE-' },
  { code: 'TRS', name: 'Journal de trésorerie', type: 'cash', prefix: 'TRS-' },
  { code: 'OD', name: 'Journal des opérations diverses', type: 'general', prefix: 'OD-' },
] as const;

export const DEFAULT_VAT_RATES = [
  { code: 'TVA20', label: 'TVA 20%', rate: 0.2 },
  { code: 'EXO', label: 'Exonéré', rate: 0 },
] as const;

// Simplified class mapping used by the balance sheet and income statement
export const REPORT_CLASS_MAPPING = {
  ASSETS: ['1', '2', '3', '5'],
  LIABILITIES_AND_EQUITY: ['4'],
  REVENUE: ['7'],
  EXPENSES: ['6'],
} as const;

export const TEMPLATE_PLACEHOLDERS = ['NOM', 'GERANT', 'DATE', 'TYPE_JURIDIQUE', 'RC'] as const;

export const RECENT_CESSIONS_LIMIT = 10;
