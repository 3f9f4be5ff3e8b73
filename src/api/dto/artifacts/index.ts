export * from './upload.artifacts.dto';
export * from './download.object.dto';
