/**
 * Prompt used when no generated prompt is available.
 */
export const FALLBACK_VIDEO_PROMPT =
    'A beautiful cinematic shot, camera is slowly rotating around the subject.';

/**
 * Instructions for the text model that writes video prompts.
 * The fuchsia bands are the padding added during preparation and must stay untouched.
 */
export const PROMPT_WRITER_INSTRUCTIONS = [
    'Analyze this image and write a creative, cinematic prompt for an AI video generation model that will use this image as its first frame.',
    'Describe the animation you expect from the video generator and the camera movement. Be creative and imaginative.',
    'The format of the image must be respected; make that clear in the prompt.',
    'If there are fuchsia bars on the image, they must stay in the video for its whole duration and must not be altered.',
    'The prompt must begin with these sentences: "Format of the video must be the same as the image. Fuchsia bands must stay in the video all along the animation."',
    'Only output the prompt for the generator and nothing else.',
].join(' ');
