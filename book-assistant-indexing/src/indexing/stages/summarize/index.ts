export * from './summarize-stage.module';
export * from './chapter-summarizer.service';
