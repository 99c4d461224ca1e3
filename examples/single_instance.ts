// examples/single_instance.ts

import {
  BusService,
  InMemoryBus,
  loggerConfig,
  StartupOption,
} from '../src';

// Two "processes" share one in-process bus. The first becomes the owner of
// org.example.editor; the second hands its command line over and exits
// with the code the owner chose.

async function main() {
  loggerConfig.level = 'warn';
  const bus = new InMemoryBus();

  const editor = await BusService.start({
    organizationDomain: 'example.org',
    applicationName: 'editor',
    options: StartupOption.Unique,
    connection: () => bus.connect(),
    arguments: ['editor'],
  });
  console.log(`[first] registered as ${editor.serviceName}: ${editor.isRegistered()}`);

  editor.on('commandLine', ({ arguments: args, workingDirectory }) => {
    console.log(`[first] asked to open ${args.slice(1).join(', ')} in ${workingDirectory}`);
    if (args.includes('--bogus')) {
      editor.setExitValue(2);
    }
  });

  await BusService.start({
    organizationDomain: 'example.org',
    applicationName: 'editor',
    options: StartupOption.Unique,
    connection: () => bus.connect(),
    arguments: ['editor', 'notes.txt', '--bogus'],
    workingDirectory: '/home/demo',
    exit: (code) => console.log(`[second] forwarded, exiting with ${code}`),
  });

  await editor.shutdown();
  await bus.close();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
