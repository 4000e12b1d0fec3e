/**
 * Bank Transaction API Routes (mounted at /tenants/:tenantId/bank-transactions)
 *
 * Imports are idempotent. Send an `Idempotency-Key` header (or
 * `idempotency_key` in the body) to make retries safe.
 */

import { Router, Request } from 'express';
import multer from 'multer';
import { bankTransactionController } from '../controllers';
import { AppError } from '../utils';

const router = Router({ mergeParams: true });

// ============================================
// Multer Configuration
// ============================================

/**
 * File filter to only accept CSV files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain', 'application/vnd.ms-excel'];

  const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.validation('Only CSV files are allowed'));
  }
};

/**
 * Statements are small enough to parse from memory
 * - Single file upload
 * - Max file size: 10MB
 */
const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: 10 * 1024 * 1024,
  },
});

// ============================================
// Routes
// ============================================

/**
 * @route   POST /tenants/:tenantId/bank-transactions/import
 * @desc    Import a batch of transactions
 *
 * Response:
 * - 201 Created: { transactions, replayed: false }
 * - 200 OK: { transactions, replayed: true } for a replayed idempotency key
 * - 409 Conflict: idempotency key reused with a different payload
 */
router.post('/import', bankTransactionController.importTransactions);

/**
 * @route   POST /tenants/:tenantId/bank-transactions/import/csv
 * @desc    Import a CSV bank statement (multipart field "file")
 */
router.post('/import/csv', upload.single('file'), bankTransactionController.importCsv);

router.get('/', bankTransactionController.listTransactions);
router.get('/:transactionId', bankTransactionController.getTransaction);

export default router;
