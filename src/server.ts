import { getPort } from "./lib/config/pcaConfig";
import { createApp } from "./lib/http/app";

const app = createApp();
const port = getPort();

app.listen(port, () => {
  console.log(`PCA server listening on http://localhost:${port}`);
});
