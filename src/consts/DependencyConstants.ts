export const ARCHIVE_SERVICE = "ArchiveService";
export const CROP_SERVICE = "CropService";
export const JOB_SERVICE = "JobService";
