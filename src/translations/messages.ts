// English catalogue for user-facing notices
export const messages = {
  record_not_found: 'Record not found.',
  access_denied: 'Access denied.',
  created_successfully: 'Created successfully.',
  edited_successfully: 'Edited successfully.',
  deleted_successfully: 'Deleted successfully.',
  rated_successfully: 'Rated successfully.'
} as const;

export type MessageKey = keyof typeof messages;

export const trans = (key: MessageKey): string => messages[key];
