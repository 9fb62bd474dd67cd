function main(): void {
  break;
}
