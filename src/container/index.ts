import {container} from 'tsyringe';
import {IArchiveService} from '../services/archiveService/IArchiveService';
import {ZipArchiveServiceImpl} from '../services/archiveService/impl/ZipArchiveServiceImpl';
import {ICropService} from '../services/cropService/ICropService';
import {CropServiceImpl} from '../services/cropService/impl/CropServiceImpl';
import {IJobService} from "../services/jobService/IJobService";
import InMemoryJobService from "../services/jobService/inMemory/InMemoryJobService";
import {ARCHIVE_SERVICE, CROP_SERVICE, JOB_SERVICE} from "../consts/DependencyConstants";
import {BatchProcessor} from "../processors/batchProcessor";
import CropController from '../controllers/cropController';
import JobController from "../controllers/JobController";

// Register service implementations
container.registerSingleton(BatchProcessor);
container.registerSingleton<IArchiveService>(ARCHIVE_SERVICE, ZipArchiveServiceImpl);
container.registerSingleton<ICropService>(CROP_SERVICE, CropServiceImpl);
container.registerSingleton<IJobService>(JOB_SERVICE, InMemoryJobService);
// Register controllers
container.registerSingleton(CropController);
container.registerSingleton(JobController);

export {container};
