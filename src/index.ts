import {
  runAndFailBuildOnException,
  runPublishAction,
} from "./github/PublishReleaseAction";

void runAndFailBuildOnException(async () => {
  await runPublishAction();
});
