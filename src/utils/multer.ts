import fs from "fs-extra";
import multer from "multer";
import { MAX_UPLOAD_BYTES } from "./constants";
import { ValidationError } from "./errors";

/**
 * Multer upload configuration storing PDFs in `uploadDir` with unique
 * filenames to avoid collisions. Limits file size to 10 MB.
 */
export function createUpload(uploadDir: string): multer.Multer {
  const storage = multer.diskStorage({
    destination: (req, file, cb) => {
      fs.ensureDir(uploadDir).then(
        () => cb(null, uploadDir),
        (error: Error) => cb(error, uploadDir),
      );
    },
    filename: (req, file, cb) => {
      const uniqueSuffix = Date.now() + "-" + Math.round(Math.random() * 1e9);
      cb(null, uniqueSuffix + "-" + file.originalname.replace(/[^\w.-]+/g, "_"));
    },
  });

  return multer({
    storage,
    limits: { fileSize: MAX_UPLOAD_BYTES },
    fileFilter: (req, file, cb) => {
      if (file.mimetype === "application/pdf") {
        cb(null, true);
      } else {
        cb(new ValidationError("Only PDF files are allowed"));
      }
    },
  });
}
