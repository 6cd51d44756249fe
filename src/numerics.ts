export enum Numeric {
  RPL_WELCOME = '001',
  RPL_ISUPPORT = '005',
  RPL_WHOISUSER = '311',
  RPL_CHANNELMODEIS = '324',
  RPL_WHOREPLY = '352',
  RPL_NAMREPLY = '353',
  RPL_ENDOFNAMES = '366',
  RPL_AWAY = '301'
}
