import { getJobRunner } from '../../src/runtime';
import { createHandler, parseJsonBody } from './_utils';

// HTTP trigger for the job runner. Job outcomes, failures included, are
// returned as 200 with the job response; only transport problems use other
// status codes.
export const handler = createHandler(['POST'], async (event, _context, { json }) => {
  const invocation = parseJsonBody(event);
  const response = await getJobRunner()(invocation);
  return json(200, response);
});
