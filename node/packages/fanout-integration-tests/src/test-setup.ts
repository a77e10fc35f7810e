import { use } from "chai";
import chaiAsPromised from "chai-as-promised";

// Setup chai-as-promised for async assertions
use(chaiAsPromised);

// Tests run silently unless VERBOSE_TESTS=true
if (process.env.VERBOSE_TESTS !== "true") {
  process.env.LOG_LEVEL = "silent";
}
