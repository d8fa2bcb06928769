/**
 * Saves a greeting, serialises a subject to a temporary file and combines
 * both in one shell command.
 */
import {
  run,
  insert,
  bindVariable,
  toJSON,
  writeTempFile,
  exec,
  defineStage,
  PipelineValues
} from '@sdk/index';

interface GreetingSubject {
  name: string;
}

const subject: GreetingSubject = { name: 'bob' };

const printOutput = defineStage('printOutput', async input => {
  if (input.type === 'bytes') {
    console.log(`\nGot output: ${input.value.toString('utf8')}`);
  }
  return PipelineValues.empty();
});

// The result holds the value of the last stage; on failure it is partial
run(
  process.stdout,
  insert(PipelineValues.text('hello')),
  bindVariable('greeting'),
  insert(PipelineValues.struct(subject)),
  toJSON(),
  writeTempFile(),
  exec('echo -n "#{greeting}" && cat #{file}'),
  printOutput
)
  .then(result => {
    if (result.status === 'failed') {
      console.error(result.error.message);
      process.exitCode = 1;
    }
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
