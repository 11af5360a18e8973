import { MulterOptions } from '@nestjs/platform-express/multer/interfaces/multer-options.interface';
import { BadRequestException } from '@nestjs/common';
import { memoryStorage } from 'multer';
import { extname } from 'path';

export const ALLOWED_EXPORT_EXTENSIONS = ['.dat', '.txt', '.htm', '.html'];

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

export const maxUploadSize = (): number => {
  const configured = parseInt(process.env.FILE_UPLOAD_MAX_SIZE ?? '', 10);
  return Number.isFinite(configured) && configured > 0
    ? configured
    : DEFAULT_MAX_FILE_SIZE;
};

export const reportUploadOptions: MulterOptions = {
  // 내보내기 파일은 요청 동안만 메모리에 보관
  storage: memoryStorage(),

  limits: {
    fileSize: maxUploadSize(),
    files: 1,
  },

  // 확장자 기준 필터링
  fileFilter: (_req, file, callback) => {
    const extension = extname(file.originalname).toLowerCase();

    if (ALLOWED_EXPORT_EXTENSIONS.includes(extension)) {
      callback(null, true);
    } else {
      callback(
        new BadRequestException(
          `Unsupported file type. Allowed extensions: ${ALLOWED_EXPORT_EXTENSIONS.join(', ')}`,
        ),
        false,
      );
    }
  },
};
