/** Subjects and bodies of the messages sent to a handover's contact. */

export type Message = { subject: string; body: string };

export function validationSubmitted(sourceUri: string): Message {
  return { subject: "HC submitted", body: `${sourceUri} has been submitted for checking` };
}

export function validationFailedToRun(sourceUri: string, jobUrl: string): Message {
  return {
    subject: "HC failed to run",
    body: `Running healthchecks vs ${sourceUri} failed to execute.\nPlease see ${jobUrl}`,
  };
}

export function validationFoundFailures(sourceUri: string, jobUrl: string): Message {
  return {
    subject: "HC ran but failed",
    body: `Running healthchecks vs ${sourceUri} completed but found failures.\nPlease see ${jobUrl}`,
  };
}

export function copyFailed(sourceUri: string, targetUri: string, jobUrl: string): Message {
  return {
    subject: "Database copy failed",
    body: `Copying ${sourceUri} to ${targetUri} failed.\nPlease see ${jobUrl}`,
  };
}
