import { createApp } from "./app.js";
import { createDeps } from "./deps.js";

const deps = createDeps();
const { server } = createApp({ deps });

server.listen(deps.settings.port, () => {
  deps.logger.info(`Server listening on http://localhost:${deps.settings.port}`, {
    timesheetSource: deps.settings.timesheetSource,
    ceilingStoreDir: deps.settings.ceilingStoreDir,
    timezone: deps.settings.timezone,
  });
});
