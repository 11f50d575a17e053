export const INSTALLER_NAME = "install-imagemagick7";
export const INSTALLER_VERSION = "1.0.0";
