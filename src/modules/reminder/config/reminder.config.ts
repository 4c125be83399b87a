import { registerAs } from '@nestjs/config';

export default registerAs('reminder', () => ({
  // Reject a create whose (owner, date, text) already exists with 409
  rejectDuplicates: process.env.REMINDER_REJECT_DUPLICATES !== 'false',
}));
