// src/service_adaptor.ts

import {
  BusValue,
  ExportedInterface,
  PlatformData,
  toPlatformData,
  toStringList,
} from "./bus";
import { BusError, BusErrorNames } from "./errors";

export const APPLICATION_INTERFACE = "org.freedesktop.Application";
export const SERVICE_INTERFACE = "org.kde.KDBusService";
export const MAIN_APPLICATION_INTERFACE = "org.qtproject.Qt.QCoreApplication";

/** Signature of CommandLine's arguments */
export const COMMAND_LINE_SIGNATURE = "assa{sv}";

/**
 * The methods a registered service makes callable over the bus.
 *
 * Only the bus side (through the adaptor below) holds a reference to the
 * implementation.
 */
export interface BusExposedHandlers {
  activate(platformData: PlatformData): void;
  open(uris: string[], platformData: PlatformData): void;
  activateAction(
    actionName: string,
    parameter: BusValue[],
    platformData: PlatformData,
  ): void;
  /** Returns the exit code for the calling instance */
  commandLine(
    args: string[],
    workingDirectory: string,
    platformData: PlatformData,
  ): number;
  quit(): void;
}

function expectString(value: BusValue | undefined, argument: string): string {
  if (typeof value !== "string") {
    throw new BusError(
      BusErrorNames.InvalidArgs,
      `Expected a string for ${argument}`,
    );
  }
  return value;
}

function expectList(value: BusValue | undefined, argument: string): BusValue[] {
  if (!Array.isArray(value)) {
    throw new BusError(
      BusErrorNames.InvalidArgs,
      `Expected an array for ${argument}`,
    );
  }
  return value;
}

/**
 * Builds the interfaces exported at the service's object path: the
 * freedesktop Application interface and the CommandLine extension.
 */
export function createActivationInterfaces(
  handlers: BusExposedHandlers,
): ExportedInterface[] {
  return [
    {
      name: APPLICATION_INTERFACE,
      methods: {
        Activate: {
          inSignature: "a{sv}",
          outSignature: "",
          handler: ([platformData]) => {
            handlers.activate(toPlatformData(platformData));
            return undefined;
          },
        },
        Open: {
          inSignature: "asa{sv}",
          outSignature: "",
          handler: ([uris, platformData]) => {
            handlers.open(
              toStringList(expectList(uris, "uris")),
              toPlatformData(platformData),
            );
            return undefined;
          },
        },
        ActivateAction: {
          inSignature: "sava{sv}",
          outSignature: "",
          handler: ([actionName, parameter, platformData]) => {
            handlers.activateAction(
              expectString(actionName, "action_name"),
              expectList(parameter, "parameter"),
              toPlatformData(platformData),
            );
            return undefined;
          },
        },
      },
    },
    {
      name: SERVICE_INTERFACE,
      methods: {
        CommandLine: {
          inSignature: COMMAND_LINE_SIGNATURE,
          outSignature: "i",
          handler: ([args, workingDirectory, platformData]) =>
            handlers.commandLine(
              toStringList(expectList(args, "arguments")),
              expectString(workingDirectory, "working_dir"),
              toPlatformData(platformData),
            ),
        },
      },
    },
  ];
}

/**
 * Builds the interface exported at /MainApplication, carrying quit.
 */
export function createMainApplicationInterfaces(
  handlers: Pick<BusExposedHandlers, "quit">,
): ExportedInterface[] {
  return [
    {
      name: MAIN_APPLICATION_INTERFACE,
      methods: {
        quit: {
          inSignature: "",
          outSignature: "",
          handler: () => {
            handlers.quit();
            return undefined;
          },
        },
      },
    },
  ];
}
