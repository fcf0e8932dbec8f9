import { runTests } from './tests';

runTests()
  .then(() => {
    console.log('Staking tests passed');
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
