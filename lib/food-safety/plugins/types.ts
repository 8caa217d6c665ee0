export type AnalysisRequest = {
  imageDataUri: string; // data:image/jpeg;base64,...
  prompt: string;
};

export type AnalysisPlugin = {
  name: string;
  order?: number; // lower runs earlier
  preprocess?: (req: AnalysisRequest) => Promise<AnalysisRequest> | AnalysisRequest;
  postprocess?: (analysis: string, req: AnalysisRequest) => Promise<string> | string;
};
