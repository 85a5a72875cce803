export * from './transcription.dto';
