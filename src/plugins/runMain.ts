/**
 * Runs the entry point of a task script: logs start and finish as JSON
 * events and turns a failure into exit code 1.
 *
 * @param name name of the script, shown in the events
 * @param main the script body
 *
 * @returns {Promise<boolean>} whether `main` succeeded
 */
export async function runMain(name: string, main: () => Promise<void>): Promise<boolean> {
  console.info(JSON.stringify({ event_type: 'script_started', name }));
  try {
    await main();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(JSON.stringify({ event_type: 'script_failed', name, error: message }));
    if (err instanceof Error && err.stack !== undefined) {
      console.error(err.stack);
    }
    process.exitCode = 1;
    return false;
  }
  console.info(JSON.stringify({ event_type: 'script_finished', name }));
  return true;
}
